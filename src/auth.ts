/**
 * Authentication middleware.
 *
 * If no token is configured, auth is disabled (allow all).
 * Otherwise, all /api/ routes require `Authorization: Bearer <token>` or `?token=<token>`.
 * Uses crypto.timingSafeEqual for constant-time comparison.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { timingSafeEqual } from "node:crypto";

/**
 * Constant-time string comparison.
 * Returns true if both strings are non-empty and equal.
 */
export function safeCompare(a: string, b: string): boolean {
  if (!a || !b) return false;
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

/**
 * Express middleware: require Bearer token for all /api/ routes.
 */
export function authMiddleware(token: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token || !req.path.startsWith("/api/")) {
      next();
      return;
    }

    const authHeader = req.headers.authorization || "";
    const queryToken = typeof req.query.token === "string" ? req.query.token : "";

    let provided = "";
    if (authHeader.startsWith("Bearer ")) {
      provided = authHeader.slice(7);
    } else if (queryToken) {
      provided = queryToken;
    }

    if (!safeCompare(provided, token)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}
