export class NotFoundError extends Error {
  constructor(message: string, public path?: string, public cause?: unknown) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidInputError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class SummaryFormatError extends Error {
  constructor(message: string, public filePath?: string, public cause?: unknown) {
    super(message);
    this.name = "SummaryFormatError";
  }
}

export class InsufficientDiskSpaceError extends Error {
  constructor(
    message: string,
    public freeBytes?: number,
    public summaryBytes?: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = "InsufficientDiskSpaceError";
  }
}

export function isErrnoException(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
