// ============================================================================
// @toonbench/core — Error Types
// ============================================================================

/**
 * Base error class for all toonbench errors.
 */
export class ToonbenchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToonbenchError';
  }
}

// ---------------------------------------------------------------------------
// Codec Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a value falls outside the JSON data model and cannot be
 * written as TOON (non-finite numbers, cycles, functions, class instances).
 */
export class EncodingError extends ToonbenchError {
  /** JSON path of the offending value, e.g. `$.labs[2].value` */
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Cannot encode value at ${path}: ${reason}`);
    this.name = 'EncodingError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Thrown when TOON text is malformed.
 */
export class ParseError extends ToonbenchError {
  /** 1-based line number */
  public readonly line: number;
  /** The raw text of the offending line */
  public readonly lineContent: string;

  constructor(message: string, line: number, lineContent: string) {
    super(`${message} (line ${line}: ${JSON.stringify(lineContent)})`);
    this.name = 'ParseError';
    this.line = line;
    this.lineContent = lineContent;
  }
}

// ---------------------------------------------------------------------------
// Benchmark Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when required configuration is missing or invalid.
 */
export class ConfigError extends ToonbenchError {
  public readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Thrown when a model endpoint call fails.
 */
export class ModelCallError extends ToonbenchError {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider} request failed${status !== undefined ? ` (HTTP ${status})` : ''}: ${message}`);
    this.name = 'ModelCallError';
    this.provider = provider;
    this.status = status;
  }
}

/**
 * Thrown when a scenario fixture file does not match the expected shape.
 */
export class ScenarioError extends ToonbenchError {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid scenario file ${source}: ${message}`);
    this.name = 'ScenarioError';
    this.source = source;
  }
}
