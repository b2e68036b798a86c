export type ErrorStage = 'config' | 'initialize' | 'pretest' | 'validate' | 'load';

export class BenchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'BenchError';
  }
}

export class ConfigError extends BenchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ScenarioError extends BenchError {
  constructor(message: string, public readonly scenario: string, cause?: Error) {
    super(message, 'SCENARIO_ERROR', 'config', cause);
    this.name = 'ScenarioError';
  }
}

export class TransportInitError extends BenchError {
  constructor(message: string, public readonly target: string, cause?: Error) {
    super(message, 'TRANSPORT_INIT_ERROR', 'initialize', cause);
    this.name = 'TransportInitError';
  }
}

/**
 * Raised by check and load operations. Only errors built with
 * `fatal: true` abort a run during continuous validation.
 */
export class CheckerError extends BenchError {
  constructor(message: string, public readonly fatal: boolean = false, cause?: Error) {
    super(message, 'CHECKER_ERROR', 'validate', cause);
    this.name = 'CheckerError';
  }
}

export class GateFailure extends BenchError {
  constructor(public readonly check: string, cause: Error) {
    super(`${check}: ${cause.message}`, 'GATE_FAILURE', 'pretest', cause);
    this.name = 'GateFailure';
  }
}

export class FatalValidationError extends BenchError {
  constructor(public readonly check: string, cause: Error) {
    super(`${check}: ${cause.message}`, 'FATAL_VALIDATION', 'validate', cause);
    this.name = 'FatalValidationError';
  }
}

export class LoadOperationError extends BenchError {
  constructor(public readonly operation: string, cause: Error) {
    super(`${operation}: ${cause.message}`, 'LOAD_ERROR', 'load', cause);
    this.name = 'LoadOperationError';
  }
}

export class EmptyRegistryError extends BenchError {
  constructor(kind: string) {
    super(`No ${kind} functions registered`, 'EMPTY_REGISTRY', 'load');
    this.name = 'EmptyRegistryError';
  }
}

export function fatalError(message: string, cause?: Error): CheckerError {
  return new CheckerError(message, true, cause);
}

export function validationError(message: string, cause?: Error): CheckerError {
  return new CheckerError(message, false, cause);
}

export function isFatal(err: unknown): boolean {
  return err instanceof CheckerError && err.fatal;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
