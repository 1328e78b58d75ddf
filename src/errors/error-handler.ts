/**
 * Error handler
 *
 * Converts thrown values to user-facing messages and turns throwing
 * operations into `{ data?, error? }` outcomes. Outcomes are how the
 * top-level API reports "absent on failure" without losing the reason.
 */

import {
  IesError,
  ResourceError,
  StructureError,
  NumericFormatError,
  ValidationError,
} from './ies-error.js';

export { IesError } from './ies-error.js';

/** Result of a wrapped operation: exactly one of `data` or `error` is set. */
export interface Outcome<T> {
  data?: T;
  error?: IesError;
}

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof ResourceError) {
      const id = err.context?.identifier;
      return typeof id === 'string'
        ? `Could not read or write "${id}". ${err.message}`
        : `Could not read or write the resource. ${err.message}`;
    }
    if (err instanceof StructureError || err instanceof NumericFormatError) {
      const line = err.context?.line;
      return typeof line === 'number'
        ? `Malformed IES data at line ${line}: ${err.message}`
        : `Malformed IES data: ${err.message}`;
    }
    if (err instanceof ValidationError) {
      return `Invalid argument: ${err.message}`;
    }
    if (err instanceof IesError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Normalize a thrown value into an IesError.
   */
  static normalize(err: unknown, context?: Record<string, unknown>): IesError {
    if (err instanceof IesError) {
      return err;
    }
    return new IesError(err instanceof Error ? err.message : String(err), 'UNKNOWN_ERROR', context);
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws: failures are returned as { error }.
   */
  static async wrap<T>(fn: () => Promise<T>, context?: Record<string, unknown>): Promise<Outcome<T>> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      return { error: ErrorHandler.normalize(err, context) };
    }
  }

  /** Synchronous counterpart of {@link ErrorHandler.wrap}. */
  static attempt<T>(fn: () => T, context?: Record<string, unknown>): Outcome<T> {
    try {
      return { data: fn() };
    } catch (err) {
      return { error: ErrorHandler.normalize(err, context) };
    }
  }
}
