/**
 * Fatal error kinds. Each one aborts the whole summary; nothing catches them
 * below the CLI.
 */

/** Non-2xx response from the HRIS API. `body` is the response text as received. */
export class HrisApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`HRIS API error ${status}: ${body}`);
    this.name = 'HrisApiError';
    this.status = status;
    this.body = body;
  }
}

/** 2xx response whose body is not a payroll-run page. */
export class HrisResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HrisResponseError';
  }
}

/** A mapping file exists but cannot be read as a JSON object of strings. */
export class MappingFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MappingFileError';
    this.path = path;
  }
}

/** Missing credentials or an unknown region. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
