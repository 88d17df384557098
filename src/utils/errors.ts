/**
 * Base error for everything the engine raises
 */
export class FlowError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid graph or operation configuration, raised synchronously by check()
 */
export class ConfigurationError extends FlowError {
  constructor(message = 'Invalid configuration', code = 'CONFIGURATION_ERROR') {
    super(message, code);
  }
}

/**
 * Topology change attempted while an endpoint is not stopped
 */
export class ConnectionError extends FlowError {
  constructor(message = 'Connection error', code = 'CONNECTION_ERROR') {
    super(message, code);
  }
}

/**
 * A processing step received a variant it cannot handle
 */
export class UnsupportedTypeError extends FlowError {
  public readonly socket: string;
  public readonly type: string;

  constructor(socket: string, type: string) {
    super(`Unsupported type '${type}' in input '${socket}'`, 'UNSUPPORTED_TYPE');
    this.socket = socket;
    this.type = type;
  }
}

/**
 * Data-dependent failure inside a processing step
 */
export class ExecutionError extends FlowError {
  constructor(message = 'Execution failed', options?: { cause?: unknown }) {
    super(message, 'EXECUTION_ERROR', true, options);
  }
}

/**
 * Value failed validation (property values, variants, graph documents)
 */
export class ValidationError extends FlowError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Execution did not finish in time
 */
export class ExecutionTimeoutError extends FlowError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Execution did not finish within ${timeoutMs}ms`, 'EXECUTION_TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap any thrown value into a FlowError, keeping FlowErrors as they are
 */
export function toFlowError(error: unknown): FlowError {
  if (error instanceof FlowError) {
    return error;
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error), { cause: error });
}
