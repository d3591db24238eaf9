/**
 * Raised only for programmer errors: a required argument that is missing,
 * empty or negative. Expected runtime conditions never throw.
 */
export class PreconditionError extends Error {
  readonly argument: string;

  readonly value: unknown;

  constructor(argument: string, value: unknown, customMessage?: string) {
    const message = customMessage ?? `Invalid argument "${argument}": ${String(value)}`;
    super(message);
    this.name = 'PreconditionError';
    this.argument = argument;
    this.value = value;
  }
}

export function requireNonNegative(argument: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new PreconditionError(argument, value, `"${argument}" must be a finite number >= 0, got ${String(value)}`);
  }
  return value;
}

export function requireNonEmpty(argument: string, value: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new PreconditionError(argument, value, `"${argument}" must be a non-empty string`);
  }
  return value;
}

const formatBytes = (bytes: number): string => {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return `${bytes}B`;
  }
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
};

export { formatBytes };
