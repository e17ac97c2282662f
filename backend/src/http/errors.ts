import type { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { DomainError } from "../errors.js";
import { logger } from "../logger.js";

function clientErrorStatus(error: unknown): number | null {
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return null;
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `No route for ${req.method} ${req.path}`,
  });
};

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  if (error instanceof DomainError) {
    logger.warn(
      { code: error.code, method: req.method, path: req.path, details: error.details },
      error.message,
    );
    res.status(error.status).json(error.toJSON());
    return;
  }

  if (error instanceof multer.MulterError) {
    logger.warn({ code: error.code, field: error.field }, "Upload rejected");
    res.status(error.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({
      error: "UPLOAD_REJECTED",
      message: error.message,
    });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== null) {
    logger.warn({ status, method: req.method, path: req.path }, "Malformed request");
    res.status(status).json({
      error: status === 413 ? "REQUEST_TOO_LARGE" : "BAD_REQUEST",
      message: error instanceof Error ? error.message : "Bad request",
    });
    return;
  }

  logger.error({ error, method: req.method, path: req.path }, "Unhandled error");
  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "Unexpected server error",
  });
};
