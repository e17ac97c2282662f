import type { Request, RequestHandler } from "express";
import { ActorSchema, authorize, type Actor, type Permission } from "../auth/actor.js";
import { UnauthenticatedError } from "../errors.js";
import { parseInput } from "../models/validation.js";

/**
 * Reads the identity the upstream authentication proxy attached to the
 * request. Handlers pass the result explicitly to the services.
 */
export function resolveActor(req: Request): Actor {
  const username = req.header("x-actor");
  if (!username) {
    throw new UnauthenticatedError();
  }

  const roles = (req.header("x-actor-roles") ?? "")
    .split(",")
    .map((role) => role.trim())
    .filter((role) => role.length > 0);

  return parseInput(ActorSchema, { username, roles });
}

/** Rejects the request before later middleware (uploads) does any work. */
export function requirePermission(permission: Permission): RequestHandler {
  return (req, _res, next) => {
    authorize(resolveActor(req), permission);
    next();
  };
}
