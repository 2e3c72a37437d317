import { NextFunction, Request, Response } from "express";
import { resolveTraceId, runWithTrace, TRACE_ID_HEADER } from "../observability/trace";

export const traceMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const traceId = resolveTraceId(req.header(TRACE_ID_HEADER));
  res.setHeader(TRACE_ID_HEADER, traceId);
  runWithTrace(traceId, () => next());
};
