/**
 * Custom error classes for mpy-forge
 * Provides structured error information for better error handling
 *
 * Fatal errors (configuration, manifest I/O) are thrown. Per-item failures
 * (a missing source, a failed compile, a failed transfer) are collected as
 * outcomes by the build and sync phases and only wrapped in these classes when
 * a caller needs a typed reason.
 */

/**
 * Base error class for mpy-forge operations
 */
export class MpyForgeError extends Error {
  constructor(
    message: string,
    public code: number,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Missing or malformed build configuration. Aborts before any mutation.
 */
export class ConfigurationError extends MpyForgeError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(message, -32010, data);
  }
}

/**
 * Tool parameter validation error
 */
export class ValidationError extends MpyForgeError {
  constructor(field: string, value: unknown, expected: string) {
    const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
    const message = `Invalid ${field}: expected ${expected}, got "${displayValue}"`;

    super(message, -32011, {
      field,
      value,
      expected
    });
  }
}

/**
 * A configured module has no resolvable source in any lookup root
 */
export class SourceNotFoundError extends MpyForgeError {
  constructor(modulePath: string, searchedRoots: string[]) {
    super(`Module not found: ${modulePath}`, -32012, {
      modulePath,
      searchedRoots
    });
  }
}

/**
 * Compiler missing, exited non-zero, or produced no artifact
 */
export class CompilerInvocationError extends MpyForgeError {
  constructor(
    message: string,
    public readonly reason: 'unavailable' | 'exit' | 'no-artifact',
    data?: Record<string, unknown>
  ) {
    super(message, -32013, { reason, ...data });
  }
}

/**
 * The target's file or hash listing is unavailable
 */
export class ProbeError extends MpyForgeError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(message, -32014, data);
  }
}

/**
 * A remote mutation (copy, delete, mkdir, reset) failed
 */
export class TransferError extends MpyForgeError {
  constructor(operation: string, path: string, reason: string) {
    super(`Cannot ${operation} ${path}: ${reason}`, -32015, {
      operation,
      path,
      reason
    });
  }
}

/**
 * The version ledger cannot be read or written
 */
export class ManifestIOError extends MpyForgeError {
  constructor(operation: 'read' | 'write', path: string, reason: string) {
    super(`Cannot ${operation} manifest ${path}: ${reason}`, -32016, {
      operation,
      path,
      reason
    });
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the errno code (ENOENT, EEXIST, ...) of a filesystem error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
