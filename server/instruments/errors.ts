// Failure taxonomy shared by the data sources and the rig controller.

type ErrorOptions = { cause?: unknown };

/** Bad input or a violated precondition; raised before any state is touched. */
export class RigValidationError extends Error {
  status: number;
  constructor(message: string, status = 400) {
    super(message);
    this.status = status;
    this.name = "RigValidationError";
  }
}

/** A device line that does not follow the DATA frame layout. */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly line: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

export class SourceTimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "SourceTimeoutError";
  }
}

export class SourceIOError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceIOError";
  }
}

/** The replay file has no more rows. Ends a run the same way a read failure does. */
export class EndOfDataError extends Error {
  constructor(message = "end of replay data") {
    super(message);
    this.name = "EndOfDataError";
  }
}

/** Opening or releasing a source failed. */
export class ResourceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResourceError";
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
