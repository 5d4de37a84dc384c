export type PlatformErrorKind =
  | "InitFailure"
  | "AssetDecodeError"
  | "FontUnavailable"
  | "SubprocessError";

export class PlatformError extends Error {
  readonly kind: PlatformErrorKind;

  constructor(kind: PlatformErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

export class InitFailure extends PlatformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("InitFailure", message, options);
  }
}

export class AssetDecodeError extends PlatformError {
  readonly assetId: string;

  constructor(assetId: string, message: string, options?: { cause?: unknown }) {
    super("AssetDecodeError", `${assetId}: ${message}`, options);
    this.assetId = assetId;
  }
}

export class FontUnavailable extends PlatformError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super("FontUnavailable", `no usable font among ${candidates.length} candidate paths`);
    this.candidates = candidates;
  }
}

export class SubprocessError extends PlatformError {
  readonly command: readonly string[];
  readonly exitCode: number | null;

  constructor(
    command: readonly string[],
    message: string,
    exitCode: number | null = null,
    options?: { cause?: unknown },
  ) {
    super("SubprocessError", `${command[0] ?? "<empty>"}: ${message}`, options);
    this.command = command;
    this.exitCode = exitCode;
  }
}

export const isPlatformError = (value: unknown): value is PlatformError =>
  value instanceof PlatformError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
