import type { NextFunction, Request, Response } from "express";
import { TokenBucket } from "./token-bucket";

type RateLimitOptions = {
  /** Requests per second shared by every client; 0 disables limiting. */
  ratePerSecond: number;
  now?: () => number;
  onLimit?: (req: Request, res: Response, retryAfterMs: number) => void;
};

export const createRateLimiter = (options: RateLimitOptions) => {
  const rate = Math.max(0, options.ratePerSecond);
  const bucket = rate > 0 ? new TokenBucket(rate, options.now) : null;

  return (req: Request, res: Response, next: NextFunction) => {
    if (!bucket) {
      next();
      return;
    }
    const allowed = bucket.allow();
    res.setHeader("X-RateLimit-Limit", String(bucket.rate));
    res.setHeader("X-RateLimit-Remaining", String(bucket.remaining()));
    if (allowed) {
      next();
      return;
    }
    const retryAfterMs = bucket.retryAfterMs();
    res.setHeader("Retry-After", String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
    if (options.onLimit) {
      options.onLimit(req, res, retryAfterMs);
    } else {
      res.status(429).type("text/plain").send("Too Many Requests");
    }
  };
};
