import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../../logger.js";

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

interface RateWindow {
  count: number;
  resetTime: number;
}

/** Fixed-window counter per client. Expired windows are swept at most once per window length. */
export class RateLimiter {
  private readonly windows = new Map<string, RateWindow>();
  private nextSweepAt = 0;

  constructor(
    readonly windowMs: number = 60000,
    readonly maxRequests: number = 100,
    private readonly clock: () => number = Date.now,
  ) {}

  get trackedClients(): number {
    return this.windows.size;
  }

  check(identifier: string): RateLimitResult {
    const now = this.clock();
    this.sweep(now);

    let window = this.windows.get(identifier);
    if (!window || now > window.resetTime) {
      window = { count: 0, resetTime: now + this.windowMs };
      this.windows.set(identifier, window);
    }

    if (window.count >= this.maxRequests) {
      return { allowed: false, remaining: 0, resetTime: window.resetTime };
    }

    window.count++;
    return {
      allowed: true,
      remaining: this.maxRequests - window.count,
      resetTime: window.resetTime,
    };
  }

  reset(identifier: string): void {
    this.windows.delete(identifier);
  }

  private sweep(now: number): void {
    if (now < this.nextSweepAt) {
      return;
    }
    for (const [identifier, window] of this.windows) {
      if (now > window.resetTime) {
        this.windows.delete(identifier);
      }
    }
    this.nextSweepAt = now + this.windowMs;
  }
}

const WRITE_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

function getClientId(req: Request): string {
  // Use the acting user if known, otherwise the IP
  const actor = req.header("x-actor");
  if (actor) {
    return `actor:${actor}`;
  }
  return `ip:${req.ip || req.socket.remoteAddress || "unknown"}`;
}

/** Limits mutating requests per client; reads pass through untouched. */
export function writeRateLimitMiddleware(limiter: RateLimiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!WRITE_METHODS.has(req.method)) {
      next();
      return;
    }

    const clientId = getClientId(req);
    const result = limiter.check(clientId);

    res.setHeader("X-RateLimit-Limit", limiter.maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader(
      "X-RateLimit-Reset",
      new Date(result.resetTime).toISOString(),
    );

    if (!result.allowed) {
      logger.warn(
        {
          clientId,
          method: req.method,
          path: req.path,
          resetTime: new Date(result.resetTime).toISOString(),
        },
        "Rate limit exceeded",
      );
      res.status(429).json({
        error: "RATE_LIMITED",
        message: `Too many requests. Please try again after ${new Date(result.resetTime).toISOString()}`,
        retryAfter: Math.ceil((result.resetTime - Date.now()) / 1000),
      });
      return;
    }

    next();
  };
}

export function requestSizeLimitMiddleware(maxSizeBytes: number = 1024 * 1024): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const contentLength = parseInt(req.headers["content-length"] || "0", 10);

    if (contentLength > maxSizeBytes) {
      logger.warn(
        {
          contentLength,
          maxSizeBytes,
          endpoint: req.path,
        },
        "Request size exceeds limit",
      );
      res.status(413).json({
        error: "REQUEST_TOO_LARGE",
        message: `Request body exceeds maximum size of ${maxSizeBytes} bytes`,
      });
      return;
    }

    next();
  };
}

export function securityHeadersMiddleware(
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  // JSON and uploaded images only; nothing here should ever run script
  res.setHeader("Content-Security-Policy", "default-src 'none'; img-src 'self'");

  next();
}
