interface PipelineErrorOptions {
  filePath?: string;
  cause?: unknown;
}

/** Raised when a source file cannot be read, decoded or parsed. */
export class ParseError extends Error {
  readonly filePath?: string;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ParseError";
    this.filePath = options.filePath;
  }
}

/** Raised when a project snapshot is missing required keys or has the wrong shape. */
export class FormatError extends Error {
  readonly filePath?: string;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FormatError";
    this.filePath = options.filePath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
