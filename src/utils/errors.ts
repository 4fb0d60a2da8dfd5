export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Invalid environment, generator settings or curriculum file. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** Malformed dataset input: missing columns, wrong types, inconsistent rows. */
export class DatasetError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : "Internal server error";
