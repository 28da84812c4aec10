import { ErrorCode, ErrorDetails, IBoardOutlineError } from '../types';

export class BoardOutlineError extends Error implements IBoardOutlineError {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Format/unit declaration missing or malformed before it was needed
export class FormatError extends BoardOutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.FormatError, message, details);
  }
}

// Non-numeric token where a number is required
export class ParseError extends BoardOutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.ParseError, message, details);
  }
}

export class UnknownToolError extends BoardOutlineError {
  constructor(public readonly toolCode: string, details?: ErrorDetails) {
    super(ErrorCode.UnknownTool, `Drill hit references undefined tool ${toolCode}`, {
      ...details,
      toolCode,
    });
  }
}

export class GeometryError extends BoardOutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.GeometryError, message, details);
  }
}

export class InvalidOptionsError extends BoardOutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.InvalidOptions, message, details);
  }
}

export class InputNotFoundError extends BoardOutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.InputNotFound, message, details);
  }
}

export class ErrorHandler {
  static isBoardOutlineError(error: unknown): error is BoardOutlineError {
    return error instanceof BoardOutlineError;
  }

  // Failures caused by the content of one input file
  static isParseFailure(error: unknown): boolean {
    return ErrorHandler.isBoardOutlineError(error) && (
      error.code === ErrorCode.FormatError ||
      error.code === ErrorCode.ParseError ||
      error.code === ErrorCode.UnknownTool
    );
  }

  static formatError(error: unknown): string {
    if (ErrorHandler.isBoardOutlineError(error)) {
      const location = ErrorHandler.formatLocation(error.details);
      return location
        ? `[${error.code}] ${error.message} (${location})`
        : `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static exitCodeFor(error: unknown): number {
    if (ErrorHandler.isBoardOutlineError(error) && error.code === ErrorCode.InvalidOptions) {
      return 2;
    }
    return 1;
  }

  private static formatLocation(details?: ErrorDetails): string | null {
    if (!details?.source) {
      return null;
    }
    return details.line !== undefined ? `${details.source}:${details.line}` : details.source;
  }
}
