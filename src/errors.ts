export class BackendUnavailableError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BackendUnavailableError";
    this.status = options?.status;
  }
}

export class MalformedChunkError extends Error {
  readonly line: string;
  readonly lineNumber: number;

  constructor(line: string, lineNumber: number, cause?: unknown) {
    super(`malformed chunk on line ${lineNumber}: ${clipLine(line)}`, cause === undefined ? undefined : { cause });
    this.name = "MalformedChunkError";
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

export function createAbortError(): Error {
  const error = new Error("Request interrupted by user.");
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): error is Error {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function clipLine(line: string): string {
  const text = line.trim();
  return text.length <= 80 ? text : `${text.slice(0, 77)}...`;
}
