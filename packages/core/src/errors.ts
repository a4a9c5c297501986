/**
 * Stable, machine-readable failure reasons.
 *
 * Configuration reasons are raised before any traversal I/O; traversal reasons abort a
 * computation that has already started walking the tree.
 */
export const ErrorReasons = [
  // Configuration
  'CONFIG_INVALID',
  'CONFIG_PARSE_ERROR',
  'PATTERN_INVALID',
  'IGNORE_FILE_UNREADABLE',
  'ROOT_INVALID',

  // Traversal
  'IO_ERROR',
  'SYMLINK_CYCLE',

  // Invariants
  'PATH_OUTSIDE_ROOT',
  'INVARIANT_VIOLATION'
] as const;

export type ErrorReason = (typeof ErrorReasons)[number];

export class DigestError extends Error {
  readonly reason: ErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: ErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DigestError';
    this.reason = reason;
    this.details = details;
  }
}

export class ConfigurationError extends DigestError {
  constructor(reason: ErrorReason, message: string, details?: Record<string, unknown>) {
    super(reason, message, details);
    this.name = 'ConfigurationError';
  }
}

export class PatternError extends ConfigurationError {
  readonly pattern: string;

  constructor(pattern: string, problem: string) {
    super('PATTERN_INVALID', `Invalid ignore pattern ${JSON.stringify(pattern)}: ${problem}`, { pattern, problem });
    this.name = 'PatternError';
    this.pattern = pattern;
  }
}

export type TraversalErrorKind = 'io' | 'cycle';

export class TraversalError extends DigestError {
  readonly kind: TraversalErrorKind;
  readonly path: string;

  constructor(kind: TraversalErrorKind, path: string, message: string, details?: Record<string, unknown>) {
    super(kind === 'cycle' ? 'SYMLINK_CYCLE' : 'IO_ERROR', message, { path, ...details });
    this.name = 'TraversalError';
    this.kind = kind;
    this.path = path;
  }

  static io(path: string, op: string, err: unknown): TraversalError {
    const error = errorMessage(err);
    return new TraversalError('io', path, `Failed to ${op} ${path}: ${error}`, { op, error, code: errorCode(err) });
  }
}

export class PathError extends DigestError {
  readonly path: string;

  constructor(path: string, root: string) {
    super('PATH_OUTSIDE_ROOT', `Path is not inside the digest root: ${path}`, { path, root });
    this.name = 'PathError';
    this.path = path;
  }
}

/** Misuse of an internal component, such as absorbing into a finalized digest. */
export class InvariantError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, details);
    this.name = 'InvariantError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
