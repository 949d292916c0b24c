/**
 * Express request id + request logging.
 *
 * Every request gets an id (the caller's X-Request-Id, or a fresh nanoid),
 * echoed back in the response header and attached to the completion log line.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { nanoid } from "nanoid";
import type { Logger } from "pino";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

const MAX_INCOMING_ID_LENGTH = 64;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get("x-request-id");
  req.id = incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : nanoid(12);
  res.setHeader("X-Request-Id", req.id);
  next();
}

/** Logs method, path, status code and duration once the response is sent. */
export function requestLogger(logger: () => Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();

    res.on("finish", () => {
      const logData = {
        reqId: req.id,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - start,
      };

      const log = logger();
      if (res.statusCode >= 500) {
        log.error(logData, "Request failed");
      } else if (res.statusCode >= 400) {
        log.warn(logData, "Request rejected");
      } else {
        log.info(logData, "Request completed");
      }
    });

    next();
  };
}
