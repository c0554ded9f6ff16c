/**
 * Rate Limiting Middleware
 *
 * Plan creation fans out to every provider and makes several model calls, so
 * it is limited far more tightly than reading stored plans.
 *
 *   POST /api/plans                      5/min per client
 *   GET  /api/plans/* (plans, logs, styles)  60/min per client
 */

import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import type { Request } from "express";

const ONE_MINUTE_MS = 60 * 1000;

interface LimiterOptions {
  perMinute: number;
  error: string;
}

function perClientLimiter({ perMinute, error }: LimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: ONE_MINUTE_MS,
    limit: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => getClientIP(req),
    handler: (req, res) => {
      console.warn(`[RateLimit] ${getClientIP(req)} exceeded ${perMinute}/min on ${req.method} ${req.originalUrl}`);
      res.status(429).json({ error: "rate_limited", message: error, retryAfter: ONE_MINUTE_MS / 1000 });
    },
  });
}

export const planCreationRateLimiter = perClientLimiter({
  perMinute: 5,
  error: "Too many plan requests. Please wait before creating another plan.",
});

export const planReadRateLimiter = perClientLimiter({
  perMinute: 60,
  error: "Too many requests. Please slow down.",
});

/** First X-Forwarded-For hop when behind a proxy, else the socket address */
export function getClientIP(req: Request): string {
  const forwarded = req.headers["x-forwarded-for"];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (first) {
    return first.split(",")[0].trim();
  }
  return req.ip || req.socket.remoteAddress || "unknown";
}
