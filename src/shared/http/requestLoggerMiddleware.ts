import { NextFunction, Request, Response } from "express";
import { Logger } from "../observability/logger";

export const requestLoggerMiddleware =
  (logger: Logger) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    let logged = false;
    const logRequest = () => {
      if (logged) {
        return;
      }
      logged = true;
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const route = req.route ? `${req.baseUrl}${String(req.route.path)}` : req.path;
      const meta = {
        method: req.method,
        route,
        statusCode: res.statusCode,
        durationMs,
        aborted: !res.writableFinished
      };
      if (res.statusCode >= 500) {
        logger.error("HTTP request", meta);
      } else {
        logger.info("HTTP request", meta);
      }
    };
    res.on("finish", logRequest);
    res.on("close", logRequest);
    next();
  };
