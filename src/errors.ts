export class NarratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends NarratorError {
  constructor(readonly inputFile: string) {
    super(`File not found: ${inputFile}`);
  }
}

export class DocumentParseError extends NarratorError {
  constructor(readonly inputFile: string, cause: unknown) {
    super(`Could not read EPUB ${inputFile}: ${errorMessage(cause)}`, { cause });
  }
}

export class SynthesisError extends NarratorError {}

export class EncodeError extends NarratorError {}

export class TemplateConfigError extends NarratorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
