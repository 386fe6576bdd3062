export type FactGraphErrorCode =
  | 'not_found'
  | 'validation'
  | 'timeout'
  | 'closed'
  | 'dependency';

export class FactGraphError extends Error {
  readonly code: FactGraphErrorCode;

  constructor(code: FactGraphErrorCode, message: string) {
    super(message);
    this.name = 'FactGraphError';
    this.code = code;
  }

  static notFound(entity: string, id: string): FactGraphError {
    return new FactGraphError('not_found', `${entity} ${id} not found`);
  }

  static validation(message: string): FactGraphError {
    return new FactGraphError('validation', message);
  }

  static timeout(operation: string, ms: number): FactGraphError {
    return new FactGraphError('timeout', `${operation} timed out after ${ms}ms`);
  }

  static closed(message = 'Knowledge graph is closed'): FactGraphError {
    return new FactGraphError('closed', message);
  }

  static dependency(message: string): FactGraphError {
    return new FactGraphError('dependency', message);
  }
}

export function isFactGraphError(
  error: unknown,
  code?: FactGraphErrorCode
): error is FactGraphError {
  return error instanceof FactGraphError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
