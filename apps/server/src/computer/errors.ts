export type ComputerUseErrorCode =
  | "SurfaceUnavailable"
  | "InvalidParameters"
  | "ScriptExecutionError"
  | "NavigationFailed"
  | "CaptureFailed";

/** Codes that abort the current loop iteration instead of degrading to output text. */
const FATAL_CODES: ReadonlySet<ComputerUseErrorCode> = new Set([
  "SurfaceUnavailable",
  "InvalidParameters",
  "NavigationFailed",
]);

export class ComputerUseError extends Error {
  readonly code: ComputerUseErrorCode;

  constructor(code: ComputerUseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ComputerUseError";
    this.code = code;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }

  static invalidParameters(message: string): ComputerUseError {
    return new ComputerUseError("InvalidParameters", message);
  }
}

export function isComputerUseError(err: unknown): err is ComputerUseError {
  return err instanceof ComputerUseError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
