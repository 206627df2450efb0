/**
 * Error taxonomy for annotation runs.
 *
 * Every failure is fatal to the run; the exit code travels with the error
 * so the CLI only has to map it.
 */
export class GpxAnnotateError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GpxAnnotateError';
  }
}

/** Missing or invalid command-line arguments / configuration */
export class UsageError extends GpxAnnotateError {
  constructor(message: string) {
    super(message, 1);
    this.name = 'UsageError';
  }
}

/** Input file could not be opened or read */
export class OpenError extends GpxAnnotateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'OpenError';
  }
}

/** Input cannot be decoded or is not well-formed XML */
export class GpxParseError extends GpxAnnotateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options);
    this.name = 'GpxParseError';
  }
}

/** Wrong root element or version, or unusable track point coordinates */
export class InvalidGpxDataError extends GpxAnnotateError {
  constructor(message: string, exitCode: number = 4) {
    super(message, exitCode);
    this.name = 'InvalidGpxDataError';
  }
}

export class NoTracksError extends InvalidGpxDataError {
  constructor(message: string) {
    super(message, 5);
    this.name = 'NoTracksError';
  }
}

/** Temp file creation, write, sync or rename failed */
export class WriteError extends GpxAnnotateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 6, options);
    this.name = 'WriteError';
  }
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
