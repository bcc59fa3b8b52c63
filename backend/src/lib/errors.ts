import type { ConversionErrorKind } from "../types";

export class ConversionError extends Error {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConversionError";
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

export const errnoCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  const code = errnoCode(error);
  const message = code ? `${code}: ${error.message}` : error.message;
  if (error.cause !== undefined) {
    return `${message} (caused by ${describeError(error.cause)})`;
  }
  return message;
};
