import cors from "cors";
import { RequestHandler } from "express";
import { TRACE_ID_HEADER } from "../observability/trace";

/** `["*"]` allows every origin; bearer tokens, not cookies, carry identity. */
export const createCorsMiddleware = (origins: readonly string[] = ["*"]): RequestHandler =>
  cors({
    origin: origins.includes("*") ? "*" : [...origins],
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE"],
    allowedHeaders: ["Content-Type", "Authorization", TRACE_ID_HEADER],
    exposedHeaders: [TRACE_ID_HEADER],
    maxAge: 86400
  });
