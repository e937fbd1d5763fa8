/**
 * Standard error classes for RecordShift
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  SOURCE_NOT_FOUND = "SOURCE_NOT_FOUND",
  SOURCE_READ_ERROR = "SOURCE_READ_ERROR",
  SCHEMA_VALIDATION_ERROR = "SCHEMA_VALIDATION_ERROR",
  PHONE_FORMAT_ERROR = "PHONE_FORMAT_ERROR",
  CONVERSION_ERROR = "CONVERSION_ERROR",
  MONGO_CONNECTION_ERROR = "MONGO_CONNECTION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Which side of a source a schema failure belongs to
 */
export type DatasetRole = "users" | "dependants";

export class RecordShiftError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RecordShiftError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends RecordShiftError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends RecordShiftError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class SourceNotFoundError extends RecordShiftError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.SOURCE_NOT_FOUND, `Source not found: ${path}`, { path }, options);
    this.name = "SourceNotFoundError";
  }
}

export class SourceReadError extends RecordShiftError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SOURCE_READ_ERROR, message, details, options);
    this.name = "SourceReadError";
  }
}

export class SchemaValidationError extends RecordShiftError {
  constructor(
    public readonly dataset: DatasetRole,
    public readonly missingColumns: readonly string[],
  ) {
    super(
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      `Missing columns in ${dataset} data: ${missingColumns.join(", ")}`,
      { dataset, missingColumns: [...missingColumns] },
    );
    this.name = "SchemaValidationError";
  }
}

export class PhoneFormatError extends RecordShiftError {
  constructor(
    public readonly value: string,
    public readonly row: number,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.PHONE_FORMAT_ERROR,
      `Invalid phone number at row ${row}: "${value}"`,
      { value, row },
      options,
    );
    this.name = "PhoneFormatError";
  }
}

export class ConversionError extends RecordShiftError {
  constructor(
    public readonly column: string,
    public readonly value: string,
    public readonly row: number,
  ) {
    super(
      ErrorCode.CONVERSION_ERROR,
      `Cannot convert "${value}" in column ${column} (row ${row}) to a number`,
      { column, value, row },
    );
    this.name = "ConversionError";
  }
}

export class MongoConnectionError extends RecordShiftError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.MONGO_CONNECTION_ERROR, message, details, options);
    this.name = "MongoConnectionError";
  }
}

/**
 * Wrap anything thrown into a RecordShiftError
 */
export function toRecordShiftError(error: unknown): RecordShiftError {
  if (error instanceof RecordShiftError) {
    return error;
  }
  return new RecordShiftError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
