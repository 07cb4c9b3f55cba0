/**
 * Structured Error Types
 *
 * Every error raised by the checkpoint engine derives from CheckpointError
 * and carries a stable `code` for programmatic handling.
 */

export type ConfigurationErrorCode =
  | 'NO_STORAGE'
  | 'NO_SCOPE'
  | 'SESSION_ALREADY_OPEN'
  | 'SESSION_NOT_OPEN'
  | 'INVALID_STORE'
  | 'INVALID_STORAGE_TARGET'
  | 'INVALID_TEMPLATE';

export type ErrorCode =
  | ConfigurationErrorCode
  | 'BAD_ATTACHMENT_ARGUMENT'
  | 'ENCODE_FAILED'
  | 'DECODE_FAILED'
  | 'STORE_FANOUT_FAILED';

interface CheckpointErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all checkpoint errors
 */
export class CheckpointError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: CheckpointErrorOptions = {}) {
    super(message);
    this.name = 'CheckpointError';
    this.code = code;
    this.timestamp = new Date();
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Misconfigured session or storage. Raised before any side effect happens.
 */
export class ConfigurationError extends CheckpointError {
  declare readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options: CheckpointErrorOptions = {}) {
    super(code, message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A non-string value was passed where a variable name was expected
 */
export class AttachmentError extends CheckpointError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super(
      'BAD_ATTACHMENT_ARGUMENT',
      'attach() only accepts variable names as strings; did you pass in the variable ' +
        `itself instead of its name (e.g. 'myList' vs myList)? Found value: ${describeValue(value)}`
    );
    this.name = 'AttachmentError';
    this.value = value;
  }
}

interface EncodeErrorOptions extends CheckpointErrorOptions {
  sessionName?: string;
  store?: string;
  /** Every store failure from the same save fan-out, this one included */
  failures?: StoreFailure[];
}

/**
 * A snapshot could not be serialized by the store's encoder
 */
export class EncodeError extends CheckpointError {
  public readonly sessionName?: string;
  public readonly store?: string;
  public readonly failures: StoreFailure[];

  constructor(message: string, options: EncodeErrorOptions = {}) {
    const failures = options.failures ?? [];
    super('ENCODE_FAILED', message, {
      cause: options.cause,
      context: {
        ...options.context,
        sessionName: options.sessionName,
        store: options.store,
        ...(failures.length > 0 && { stores: failures.map((failure) => failure.store) }),
      },
    });
    this.name = 'EncodeError';
    this.sessionName = options.sessionName;
    this.store = options.store;
    this.failures = failures;
  }
}

/**
 * Stored bytes are not a readable snapshot.
 * Stores catch this and report the snapshot as absent.
 */
export class DecodeError extends CheckpointError {
  constructor(message: string, options: CheckpointErrorOptions = {}) {
    super('DECODE_FAILED', message, options);
    this.name = 'DecodeError';
  }
}

export type FanoutOperation = 'save' | 'wipe';

export interface StoreFailure {
  /** Label of the store that failed */
  store: string;
  error: unknown;
}

/**
 * One or more stores failed during a save or wipe fan-out
 */
export class StoreFanoutError extends CheckpointError {
  public readonly sessionName: string;
  public readonly operation: FanoutOperation;
  public readonly failures: StoreFailure[];

  constructor(sessionName: string, operation: FanoutOperation, failures: StoreFailure[]) {
    const details = failures
      .map((failure) => `${failure.store}: ${errorMessage(failure.error)}`)
      .join('; ');
    super(
      'STORE_FANOUT_FAILED',
      `Failed to ${operation} checkpoint '${sessionName}' in ${failures.length} ` +
        `store${failures.length === 1 ? '' : 's'} (${details})`,
      { context: { sessionName, operation, stores: failures.map((failure) => failure.store) } }
    );
    this.name = 'StoreFanoutError';
    this.sessionName = sessionName;
    this.operation = operation;
    this.failures = failures;
  }
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'function') {
    return `[function ${value.name || 'anonymous'}]`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
