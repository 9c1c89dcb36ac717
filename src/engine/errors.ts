import type { EngineError } from '../types';

export type DogErrorCode =
  | 'INVALID_ACTION'
  | 'STEP_BUDGET_EXCEEDED'
  | 'DECK_EXHAUSTED'
  | 'INVALID_STATE'
  | 'INVALID_OPTIONS';

/**
 * 引擎抛出的唯一错误类型。apply_action 直接抛出；step() 会把它转成 { ok:false, error }。
 */
export class DogEngineError extends Error implements EngineError {
  readonly code: DogErrorCode;
  readonly details?: unknown;

  constructor(code: DogErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DogEngineError';
    this.code = code;
    this.details = details;
  }

  to_json(): EngineError {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export function invalid_action(message: string, details?: unknown): DogEngineError {
  return new DogEngineError('INVALID_ACTION', message, details);
}

export function is_engine_error(e: unknown): e is DogEngineError {
  return e instanceof DogEngineError;
}
