import type { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";

// JWT Authentication Middleware
//
// Identity is issued by the external user-identity provider. This service only
// verifies the bearer token (HS256, shared secret) and reads two claims:
// - sub:  the user id (opaque reference)
// - role: "user" (default) or "admin" (catalog administration, confirmations)

export type AuthRole = "user" | "admin";

export interface AuthContext {
  userId: string;
  role: AuthRole;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(["user", "admin"]).default("user"),
});

export interface AuthOptions {
  readonly jwtSecret: string;
  // Development only: identity is read from x-user-id / x-user-role headers.
  readonly disableAuth: boolean;
}

export function verifyToken(token: string, secret: string): AuthContext {
  const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  const claims = ClaimsSchema.parse(decoded);
  return { userId: claims.sub, role: claims.role };
}

export function createAuthMiddleware(options: AuthOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Health check and the public catalog are open.
    if (req.path === "/api/health" || req.path.startsWith("/api/catalog")) {
      return next();
    }

    if (options.disableAuth) {
      const userId = req.header("x-user-id");
      if (userId) {
        req.auth = { userId, role: req.header("x-user-role") === "admin" ? "admin" : "user" };
      }
      return next();
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>", code: "UNAUTHENTICATED" });
      return;
    }

    const token = authHeader.slice(7);

    try {
      req.auth = verifyToken(token, options.jwtSecret);
      next();
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        res.status(401).json({ error: "Token expired. Please refresh your token.", code: "UNAUTHENTICATED" });
      } else {
        res.status(401).json({ error: "Invalid token.", code: "UNAUTHENTICATED" });
      }
    }
  };
}

export function requireAuth(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth) {
    res.status(401).json({ error: "Authentication required.", code: "UNAUTHENTICATED" });
    return;
  }
  next();
}

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth) {
    res.status(401).json({ error: "Authentication required.", code: "UNAUTHENTICATED" });
    return;
  }
  if (req.auth.role !== "admin") {
    res.status(403).json({ error: "Admin role required.", code: "FORBIDDEN" });
    return;
  }
  next();
}

// Owner of :userId, or an admin.
export function requireSelfOrAdmin(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth) {
    res.status(401).json({ error: "Authentication required.", code: "UNAUTHENTICATED" });
    return;
  }
  if (req.auth.role !== "admin" && req.auth.userId !== req.params.userId) {
    res.status(403).json({ error: "Access to another user's allergies is not allowed.", code: "FORBIDDEN" });
    return;
  }
  next();
}
