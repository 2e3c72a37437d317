import { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { AppError } from "./AppError";
import { Metrics } from "../observability/metrics";

export const userRoles = ["CUSTOMER", "EMPLOYEE"] as const;

export type UserRole = (typeof userRoles)[number];

export type AuthConfig = {
  jwtKey: string;
  metrics: Pick<Metrics, "recordAuthFailure">;
};

export type AuthenticatedRequest = Request & {
  userId?: string;
  userRole?: UserRole;
};

export type AccessTokenClaims = {
  userId: string;
  role: UserRole;
};

const isUserRole = (value: unknown): value is UserRole =>
  value === "CUSTOMER" || value === "EMPLOYEE";

/**
 * Verifies an HS256 access token and returns its subject and role claim.
 * Returns null when the token is structurally valid but lacks either claim;
 * signature and expiry problems are thrown as jsonwebtoken errors.
 */
export const verifyAccessToken = (token: string, jwtKey: string): AccessTokenClaims | null => {
  const payload = jwt.verify(token, jwtKey, { algorithms: ["HS256"] });
  if (typeof payload === "string") {
    return null;
  }
  const userId = typeof payload.sub === "string" ? payload.sub : "";
  const role: unknown = payload["role"];
  if (userId.length === 0 || !isUserRole(role)) {
    return null;
  }
  return { userId, role };
};

export const authMiddleware =
  (config: AuthConfig) =>
  (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? "";
    const token = header.startsWith("Bearer ") ? header.slice(7) : "";
    if (!token) {
      config.metrics.recordAuthFailure("missing_token");
      next(new AppError("UNAUTHORIZED", 401, "Unauthorized"));
      return;
    }

    try {
      const claims = verifyAccessToken(token, config.jwtKey);
      if (!claims) {
        config.metrics.recordAuthFailure("missing_claims");
        next(new AppError("UNAUTHORIZED", 401, "Unauthorized"));
        return;
      }
      req.userId = claims.userId;
      req.userRole = claims.role;
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        config.metrics.recordAuthFailure("token_expired");
      } else if (error instanceof jwt.JsonWebTokenError) {
        config.metrics.recordAuthFailure("token_malformed");
      } else {
        config.metrics.recordAuthFailure("invalid_token");
      }
      next(new AppError("UNAUTHORIZED", 401, "Unauthorized"));
    }
  };

export const requireRole =
  (role: UserRole) =>
  (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
    if (!req.userId) {
      next(new AppError("UNAUTHORIZED", 401, "Unauthorized"));
      return;
    }
    if (req.userRole !== role) {
      const audience = role === "EMPLOYEE" ? "employees" : "customers";
      next(new AppError("FORBIDDEN", 403, `Only ${audience} can access this endpoint`));
      return;
    }
    next();
  };
