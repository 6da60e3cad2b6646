// src/utils/errors.ts
import type { ZodError } from 'zod';

export type SimulationErrorCode =
  | 'ERR_INVALID_CONFIG'
  | 'ERR_SHOE_EMPTY'
  | 'ERR_ILLEGAL_ACTION'
  | 'ERR_GENERATOR_MISUSE';

export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode,
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/** Bad request or bad rules: reported before any round is dealt. */
export class InvalidConfigurationError extends SimulationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'ERR_INVALID_CONFIG');
    this.name = 'InvalidConfigurationError';
  }

  static fromZod(err: ZodError, what = 'configuration'): InvalidConfigurationError {
    const issues = err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new InvalidConfigurationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
}

export class ShoeEmptyError extends SimulationError {
  constructor(public readonly size: number) {
    super(`Shoe of ${size} cards is empty`, 'ERR_SHOE_EMPTY');
    this.name = 'ShoeEmptyError';
  }
}

export class IllegalActionError extends SimulationError {
  constructor(
    public readonly strategy: string,
    public readonly proposed: string,
    public readonly applied: string,
  ) {
    super(`Strategy "${strategy}" proposed illegal action "${proposed}", applied "${applied}"`, 'ERR_ILLEGAL_ACTION');
    this.name = 'IllegalActionError';
  }
}

export class GeneratorMisuseError extends SimulationError {
  constructor(message: string) {
    super(message, 'ERR_GENERATOR_MISUSE');
    this.name = 'GeneratorMisuseError';
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      code: isSimulationError(err) ? err.code : undefined,
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    code: undefined,
    stack: '',
  };
}
