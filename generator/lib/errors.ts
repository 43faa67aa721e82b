import type { IconErrorCode, IconErrorParams } from "../../shared/error-codes";

export class IconGenerationError extends Error {
  readonly code: IconErrorCode;
  readonly params?: IconErrorParams;

  constructor(code: IconErrorCode, message: string, params?: IconErrorParams) {
    super(message);
    this.name = "IconGenerationError";
    this.code = code;
    this.params = params;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
