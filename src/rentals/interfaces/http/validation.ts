import { z } from "zod";
import { AppError } from "../../../shared/http/AppError";
import { AuthenticatedRequest, UserRole } from "../../../shared/http/authMiddleware";

export const parseInput = <T extends z.ZodType>(schema: T, value: unknown): z.output<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new AppError("INVALID_INPUT", 400, `Invalid request: ${detail}`);
  }
  return parsed.data;
};

export const pathParam = (req: AuthenticatedRequest, name: string): string => {
  const raw = req.params[name];
  const value = typeof raw === "string" ? raw.trim() : "";
  if (value.length === 0) {
    throw new AppError("INVALID_INPUT", 400, "Invalid request");
  }
  return value;
};

export type Requester = {
  userId: string;
  role: UserRole;
};

export const requester = (req: AuthenticatedRequest): Requester => {
  const userId = req.userId ?? "";
  if (userId.length === 0 || !req.userRole) {
    throw new AppError("UNAUTHORIZED", 401, "Unauthorized");
  }
  return { userId, role: req.userRole };
};
