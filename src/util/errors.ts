export class AppError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type NormalizedError = {
  name: string;
  code?: string;
  message: string;
  stack: string;
};

export function normalizeError(err: unknown): NormalizedError {
  if (err instanceof AppError) {
    return { name: err.name, code: err.code, message: err.message, stack: err.stack || '' };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

export function shortStack(err: unknown, lines = 3): string {
  const { stack } = normalizeError(err);
  if (!stack) return '';
  return stack.split('\n').slice(0, lines + 1).join('\n');
}
