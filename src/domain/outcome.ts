/**
 * Result type returned across component boundaries.
 *
 * Retrieval, credential resolution and sink writes report failure as a
 * value; the orchestrator decides what a failure means for the run.
 */

import { TypedError } from './errors';

export type Outcome<T> =
  | { success: true; value: T }
  | { success: false; error: TypedError };

export function succeed<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T = never>(error: TypedError): Outcome<T> {
  return { success: false, error };
}
