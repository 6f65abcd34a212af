export type HarnessErrorKind = "invalid-arguments" | "filesystem";
export type FilesystemOperation = "stat" | "mkdir" | "write" | "chmod";

export class HarnessError extends Error {
  readonly kind: HarnessErrorKind;

  constructor(message: string, kind: HarnessErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "HarnessError";
    this.kind = kind;
  }
}

export class InvalidArgumentsError extends HarnessError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "invalid-arguments", options);
    this.name = "InvalidArgumentsError";
  }
}

export class FilesystemError extends HarnessError {
  readonly path: string;
  readonly operation: FilesystemOperation;
  readonly code: string | undefined;

  constructor(operation: FilesystemOperation, filePath: string, cause: unknown) {
    super(`${operation} failed for ${filePath}: ${errorMessage(cause)}`, "filesystem", { cause });
    this.name = "FilesystemError";
    this.path = filePath;
    this.operation = operation;
    this.code = errnoCode(cause);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
