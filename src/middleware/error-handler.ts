import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  status: ContentfulStatusCode;

  constructor(message: string, status: ContentfulStatusCode = 500) {
    super(message);
    this.status = status;
  }
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const message = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request";
    logger.warn("request_invalid", { requestId, path: c.req.path, message });
    return c.json({ code: 400, message }, 400);
  }

  if (error instanceof AppError) {
    logger.warn("request_failed", {
      requestId,
      status: error.status,
      path: c.req.path,
      message: error.message,
    });
    return c.json({ code: error.status, message: error.message }, error.status);
  }

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message: error instanceof Error ? error.message : String(error),
  });

  return c.json({ code: 500, message: "Internal Server Error" }, 500);
}
