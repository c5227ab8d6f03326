export type ErrorKind = "configuration" | "service_unavailable" | "validation";

export class AppError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credentials or settings that can never work. Fatal at start-up. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** An embedding, chat or vector store call failed. */
export class ServiceUnavailableError extends AppError {
  constructor(
    readonly service: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("service_unavailable", message, options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("validation", message);
  }
}

export const HTTP_ERROR_STATUS: Record<ErrorKind, number> = {
  configuration: 500,
  service_unavailable: 500,
  validation: 400,
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toHttpError = (
  error: unknown
): { status: number; message: string } => {
  if (error instanceof AppError) {
    return { status: HTTP_ERROR_STATUS[error.kind], message: error.message };
  }
  return { status: 500, message: errorMessage(error) };
};
