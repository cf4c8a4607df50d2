import type { NextFunction, Request, Response } from "express";
import { logger } from "../lib/logger";
import { AppError, isAppError } from "../lib/errors";

export interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// express.json() reports unparsable bodies as a SyntaxError carrying `status`
const isBodyParseError = (err: unknown): err is SyntaxError & { status: number } =>
  err instanceof SyntaxError && "status" in err;

const toAppError = (err: unknown): AppError => {
  if (isAppError(err)) return err;
  if (isBodyParseError(err)) {
    return new AppError("Request body is not valid JSON", { statusCode: 400, code: "VALIDATION_ERROR", cause: err });
  }
  return new AppError(err instanceof Error ? err.message : "Internal Server Error", { code: "INTERNAL_ERROR", cause: err });
};

export const errorMiddleware = (
  err: unknown,
  _req: Request,
  res: Response<ErrorResponseBody>,
  _next: NextFunction,
) => {
  const appError = toAppError(err);
  const statusCode = appError.statusCode;

  if (statusCode >= 500) {
    logger.error({ err, statusCode, code: appError.code }, appError.message);
  } else {
    logger.warn({ statusCode, code: appError.code }, appError.message);
  }

  res.status(statusCode).json({
    error: {
      code: appError.code,
      message: statusCode >= 500 ? "Internal Server Error" : appError.message,
      details: appError.details,
    },
  });
};
