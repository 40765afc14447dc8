import { NextFunction, Request, Response } from "express";
import { createTraceId, runWithTrace } from "../observability/trace";

const TRACE_HEADER = "x-trace-id";
const TRACE_ID_PATTERN = /^[a-zA-Z0-9-]{8,128}$/;

export const traceMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.header(TRACE_HEADER);
  const traceId =
    incoming !== undefined && TRACE_ID_PATTERN.test(incoming) ? incoming : createTraceId();
  res.setHeader(TRACE_HEADER, traceId);
  runWithTrace(traceId, () => next());
};
