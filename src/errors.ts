/**
 * Base class for every error raised by this package
 */
export class SwgohToolsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A gear recipe eventually requires itself
 */
export class CyclicDependencyError extends SwgohToolsError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Cyclic gear dependency: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

/**
 * Fetched or loaded data does not match the expected shape
 */
export class DataFormatError extends SwgohToolsError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`Malformed data from ${source}: ${detail}`);
    this.source = source;
  }
}

/**
 * The API answered with a non-success status or the request failed outright
 */
export class ApiRequestError extends SwgohToolsError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, detail: string, statusCode?: number) {
    super(
      statusCode === undefined
        ? `Failed to fetch ${url}: ${detail}`
        : `Failed to fetch ${url}: HTTP ${statusCode} ${detail}`.trimEnd()
    );
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class InvalidAllyCodeError extends SwgohToolsError {
  constructor(allyCode: string) {
    super(`Invalid ally code "${allyCode}": expected 9 digits (dashes allowed)`);
  }
}

export class ConfigurationError extends SwgohToolsError {}
