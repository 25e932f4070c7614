export class FormatError extends Error {
  source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = "FormatError";
    this.source = source;
  }
}

export class EmptyInputError extends Error {
  source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = "EmptyInputError";
    this.source = source;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
