import rateLimit from "express-rate-limit";
import type { Request } from "express";

// Rate Limiting Middleware
//
// Two tiers:
// 1. General API: 120 req/min per staff member
// 2. Diagnosis changes: 20 req/10 min per staff member
//
// Key extraction: uses auth payload staffId, falls back to IP.

function extractKey(req: Request): string {
  if (req.auth?.staffId) return req.auth.staffId;
  return req.ip || req.socket.remoteAddress || "unknown";
}

export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 120,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
});

export const diagnosisChangeRateLimiter = rateLimit({
  windowMs: 10 * 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Diagnosis change limit reached. Please wait before trying again.", retryAfterMs: 600000 },
});
