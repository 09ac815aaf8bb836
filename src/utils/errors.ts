import { FieldError } from "../types/crm";

export enum ErrorKind {
  Validation = "VALIDATION",
  NotFound = "NOT_FOUND",
  Conflict = "CONFLICT",
  Internal = "INTERNAL",
}

export const GENERAL_ERROR_MESSAGE = "An unexpected error occurred";

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly fieldErrors: FieldError[];

  constructor(kind: ErrorKind, message: string, fieldErrors: FieldError[] = []) {
    super(message);
    this.name = "AppError";
    this.kind = kind;
    this.fieldErrors = fieldErrors;
  }

  static validation(fieldErrors: FieldError[]): AppError {
    return new AppError(ErrorKind.Validation, "Validation failed", fieldErrors);
  }

  static notFound(field: string, message: string): AppError {
    return new AppError(ErrorKind.NotFound, message, [{ field, message }]);
  }

  static internal(): AppError {
    return new AppError(ErrorKind.Internal, GENERAL_ERROR_MESSAGE, [
      { field: "general", message: GENERAL_ERROR_MESSAGE },
    ]);
  }
}

// MongoServerError for a unique index violation
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === 11000;

const duplicateKeyField = (error: unknown): string => {
  if (
    typeof error === "object" &&
    error !== null &&
    "keyPattern" in error &&
    typeof error.keyPattern === "object" &&
    error.keyPattern !== null
  ) {
    const [field] = Object.keys(error.keyPattern);
    if (field) {
      return field;
    }
  }
  return "general";
};

const capitalize = (value: string): string =>
  value.charAt(0).toUpperCase() + value.slice(1);

/**
 * Maps a thrown value onto the closed error kinds. Anything not recognised
 * becomes Internal and carries only the generic message.
 */
export const toAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDuplicateKeyError(error)) {
    const field = duplicateKeyField(error);
    const message =
      field === "general" ? "Record already exists" : `${capitalize(field)} already exists`;
    return new AppError(ErrorKind.Conflict, message, [{ field, message }]);
  }

  return AppError.internal();
};

/** Converts a failure into field errors, logging the raw error when it is unexpected. */
export const toFieldErrors = (error: unknown, context: string): FieldError[] => {
  const appError = toAppError(error);
  if (appError.kind === ErrorKind.Internal) {
    console.error(`❌ ${context}:`, error);
  }
  return appError.fieldErrors;
};
