import rateLimit from "express-rate-limit";
import type { Request, RequestHandler } from "express";

// Rate Limiting Middleware
//
// Two tiers:
// 1. General API: 100 req/min per user
// 2. Writes (POST/PATCH/DELETE): 30 req/min per user
//
// Key extraction: authenticated user id, falls back to IP.

function extractKey(req: Request): string {
  if (req.auth?.userId) return req.auth.userId;
  return req.ip || req.socket.remoteAddress || "unknown";
}

export interface RateLimiters {
  readonly general: RequestHandler;
  readonly writes: RequestHandler;
}

export function createRateLimiters(): RateLimiters {
  return {
    general: rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: 100,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      message: { error: "Too many requests. Please try again later.", code: "RATE_LIMITED", retryAfterMs: 60000 },
    }),

    writes: rateLimit({
      windowMs: 60 * 1000,
      max: 30,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      skip: (req) => req.method === "GET" || req.method === "HEAD" || req.method === "OPTIONS",
      message: { error: "Write limit reached. Please wait before trying again.", code: "RATE_LIMITED", retryAfterMs: 60000 },
    }),
  };
}
