import express, { type Express } from "express";
import cors from "cors";
import type Database from "better-sqlite3";
import type { Config } from "../config/env.js";
import { resolveActor } from "./actor.js";
import { errorHandler, notFoundHandler } from "./errors.js";
import {
  RateLimiter,
  requestSizeLimitMiddleware,
  securityHeadersMiddleware,
  writeRateLimitMiddleware,
} from "./middleware/security.js";
import { customerRouter } from "./routes/customers.js";
import { productRouter } from "./routes/products.js";
import { saleRouter } from "./routes/sales.js";
import { createServices } from "./services.js";
import { createImageUpload } from "./upload.js";

export interface AppOptions {
  db: Database.Database;
  config: Config;
  now?: () => Date;
}

export function createApp({ db, config, now }: AppOptions): Express {
  const services = createServices(db, now);
  const app = express();

  app.use(securityHeadersMiddleware);
  // Image uploads are the largest bodies we accept
  app.use(requestSizeLimitMiddleware(config.maxImageSizeBytes + 64 * 1024));
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));
  app.use(
    writeRateLimitMiddleware(
      new RateLimiter(config.rateLimitWindowMs, config.rateLimitMaxWrites),
    ),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: services.now().toISOString() });
  });

  app.use("/uploads", express.static(config.uploadDir, { index: false }));

  app.use(
    "/api/products",
    productRouter(services, {
      upload: createImageUpload(config),
      uploadDir: config.uploadDir,
      pageSize: config.pageSize,
    }),
  );
  app.use("/api/customers", customerRouter(services, config.pageSize));
  app.use("/api/sales", saleRouter(services, config.pageSize));

  app.get("/api/dashboard", (req, res) => {
    resolveActor(req);
    res.json(services.reports.dashboard(services.now()));
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
