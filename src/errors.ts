export type ErrorCode = "INVALID_INPUT" | "DESTINATION_UNAVAILABLE";

export class DupsiftError extends Error {
  code: ErrorCode;
  context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "DupsiftError";
    this.code = code;
    this.context = context;
  }
}

/** Bad caller input: missing root, no folders, missing move target. */
export class InputValidationError extends DupsiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_INPUT", message, context);
    this.name = "InputValidationError";
  }
}

/** The move target directory could not be prepared. */
export class DestinationError extends DupsiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("DESTINATION_UNAVAILABLE", message, context);
    this.name = "DestinationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node.js system error (ENOENT, EXDEV, ...), if any. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
