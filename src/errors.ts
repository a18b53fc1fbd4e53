/**
 * Error handling for p-value table processing
 *
 * Every failure the pipeline can raise is one of these classes. All of them
 * are fatal: nothing here is retried or recovered from.
 */

/**
 * Base error class for all fdvalues errors
 */
export class FdValuesError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FdValuesError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid configuration or option values (thresholds, paths, writer options)
 */
export class ValidationError extends FdValuesError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends FdValuesError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  /** The message without the line/column/field suffix */
  public readonly reason: string;

  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
    this.reason = message;
  }
}

/**
 * The p-value table does not have the expected shape
 *
 * Raised for non-integer position labels, repeated position labels, ragged
 * rows, unparseable cells and inputs with no header at all.
 */
export class MalformedInputError extends FdValuesError {
  constructor(
    message: string,
    public readonly filePath?: string,
    lineNumber?: number,
    public readonly column?: number,
    context?: string
  ) {
    super(message, "MALFORMED_INPUT", lineNumber, context);
    this.name = "MalformedInputError";
  }

  /**
   * Re-raise a low-level DSV failure as a table shape error
   */
  static fromParseError(error: DSVParseError, filePath?: string): MalformedInputError {
    return new MalformedInputError(
      error.reason,
      filePath,
      error.line,
      error.column,
      error.field
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.filePath !== undefined) {
      msg += `\nFile: ${this.filePath}`;
    }
    if (this.column !== undefined) {
      msg += `\nColumn: ${this.column}`;
    }
    return msg;
  }
}

/**
 * A key that must be unique appears more than once
 *
 * The pipeline never picks one of the duplicates: the run stops here.
 */
export class DuplicateKeyError extends FdValuesError {
  constructor(
    message: string,
    public readonly key: string,
    public readonly lineNumbers: readonly number[] = [],
    context?: string
  ) {
    super(message, "DUPLICATE_KEY", lineNumbers[1], context);
    this.name = "DuplicateKeyError";
  }

  /**
   * Create error for a read id that labels more than one row
   */
  static forReadId(readId: string, lineNumbers: readonly number[] = []): DuplicateKeyError {
    const where = lineNumbers.length > 0 ? ` on lines ${lineNumbers.join(" and ")}` : "";
    return new DuplicateKeyError(
      `Duplicate read id "${readId}"${where}; read ids must be unique`,
      readId,
      lineNumbers
    );
  }

  /**
   * Create error for a (read, position) pair observed twice
   */
  static forObservation(readId: string, pos0b: number): DuplicateKeyError {
    return new DuplicateKeyError(
      `Read "${readId}" has more than one p-value at position ${pos0b}`,
      `${readId}@${pos0b}`
    );
  }

  override toString(): string {
    return `${super.toString()}\nKey: ${this.key}`;
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends FdValuesError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? `. File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors: the source could not be read or the sink could not be written
 */
export class FileError extends FdValuesError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }

    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the parent directory exists";
    }
    if (
      msg.includes("eacces") ||
      msg.includes("permission denied") ||
      msg.includes("permissiondenied")
    ) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = `${super.toString()}\nPath: ${this.filePath}`;

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Suggestions for common error scenarios
 */
export const ERROR_SUGGESTIONS = {
  NON_INTEGER_POSITION:
    "Every header cell after the first must be a 0-based integer position, e.g. 0,1,2",
  RAGGED_ROW: "Every row needs one read id followed by one cell per position column",
  BAD_PVALUE: "Cells must be p-values between 0 and 1, or empty when the read was not tested",
  DUPLICATE_READ_ID: "Remove or rename the repeated read; the pipeline will not choose between them",
  BAD_THRESHOLDS: "Thresholds must satisfy 0 <= lower <= upper <= 1",
  COMPRESSED_FILE_ERROR: "Check the file is a complete gzip archive, or decompress it first",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: FdValuesError): string | undefined {
  const message = error.message.toLowerCase();

  if (error instanceof DuplicateKeyError) {
    return ERROR_SUGGESTIONS.DUPLICATE_READ_ID;
  }
  if (error instanceof CompressionError) {
    return ERROR_SUGGESTIONS.COMPRESSED_FILE_ERROR;
  }
  if (error instanceof MalformedInputError) {
    if (message.includes("position label")) {
      return ERROR_SUGGESTIONS.NON_INTEGER_POSITION;
    }
    if (message.includes("columns, expected")) {
      return ERROR_SUGGESTIONS.RAGGED_ROW;
    }
    if (message.includes("p-value")) {
      return ERROR_SUGGESTIONS.BAD_PVALUE;
    }
  }
  if (error instanceof ValidationError && message.includes("thresh")) {
    return ERROR_SUGGESTIONS.BAD_THRESHOLDS;
  }

  return undefined;
}
