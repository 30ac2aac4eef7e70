/**
 * Error taxonomy for tool invocations.
 *
 * Every fault that reaches the dispatcher is turned into a `ToolError`; its
 * `kind` is what the caller sees in the failure result.
 */

export type ErrorKind =
  | 'NotLaunchedError'
  | 'AlreadyLaunchedError'
  | 'InvalidArgumentError'
  | 'SelectorNotFoundError'
  | 'TimeoutError'
  | 'ScriptEvaluationError'
  | 'EngineError';

export interface ToolErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ToolError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(
    readonly kind: ErrorKind,
    message: string,
    options: ToolErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.details = options.details;
  }
}

export class NotLaunchedError extends ToolError {
  constructor(message = 'Browser not launched. Call launch_browser first.') {
    super('NotLaunchedError', message);
  }
}

export class AlreadyLaunchedError extends ToolError {
  constructor(message = 'Browser already launched. Call close_browser before launching again.') {
    super('AlreadyLaunchedError', message);
  }
}

export class InvalidArgumentError extends ToolError {
  constructor(message: string, options?: ToolErrorOptions) {
    super('InvalidArgumentError', message, options);
  }
}

export class SelectorNotFoundError extends ToolError {
  constructor(
    readonly selector: string,
    message = `No element matches selector "${selector}"`,
    options?: ToolErrorOptions,
  ) {
    super('SelectorNotFoundError', message, options);
  }
}

export class TimeoutError extends ToolError {
  constructor(message: string, options?: ToolErrorOptions) {
    super('TimeoutError', message, options);
  }
}

export class ScriptEvaluationError extends ToolError {
  constructor(message: string, options?: ToolErrorOptions) {
    super('ScriptEvaluationError', message, options);
  }
}

export class EngineError extends ToolError {
  constructor(message: string, options?: ToolErrorOptions) {
    super('EngineError', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Anything that is not already a `ToolError` is an engine fault.
 */
export function toToolError(err: unknown): ToolError {
  if (err instanceof ToolError) {
    return err;
  }
  return new EngineError(errorMessage(err), { cause: err });
}
