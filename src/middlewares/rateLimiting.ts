/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 * Factories, so every app instance keeps its own counters.
 */

import rateLimit from "express-rate-limit";

/**
 * General API rate limiter.
 * Limits: 200 requests per 15 minutes per IP.
 */
export function createApiLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 200, // Limit each IP to 200 requests per windowMs
    message: { detail: "Too many requests from this IP, please try again later." },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
  });
}

/**
 * Strict rate limiter for downloads, which spawn yt-dlp and move real bytes.
 * Limits: 20 requests per 15 minutes per IP.
 */
export function createStrictLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 20,
    message: { detail: "Too many downloads, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
