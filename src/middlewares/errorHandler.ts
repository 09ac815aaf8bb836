import { NextFunction, Request, Response } from "express";
import { AppError, ErrorKind, GENERAL_ERROR_MESSAGE, toAppError } from "../utils/errors";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKind.Validation]: 400,
  [ErrorKind.NotFound]: 404,
  [ErrorKind.Conflict]: 409,
  [ErrorKind.Internal]: 500,
};

// express.json() marks unparseable bodies with this type
const isMalformedBody = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  error.type === "entity.parse.failed";

const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
): void => {
  const appError = isMalformedBody(error)
    ? AppError.validation([{ field: "input", message: "Malformed JSON body" }])
    : toAppError(error);

  if (appError.kind === ErrorKind.Internal) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  }

  res.status(STATUS_BY_KIND[appError.kind]).json({
    success: false,
    message: appError.kind === ErrorKind.Internal ? GENERAL_ERROR_MESSAGE : appError.message,
    errors: appError.fieldErrors,
  });
};

export default errorHandler;
