/**
 * @exsync/eas-sync - Result
 *
 * Two-variant outcome returned by every public operation.
 */

import { EasError } from './errors';

import type { EasErrorCode, EasErrorOptions } from './errors';

export interface Success<T> {
  ok: true;
  data: T;
}

export interface Failure {
  ok: false;
  error: EasError;
}

export type EasResult<T> = Success<T> | Failure;

export function ok<T>(data: T): Success<T> {
  return { ok: true, data };
}

export function err(error: EasError): Failure {
  return { ok: false, error };
}

/**
 * Shorthand for `err(new EasError(message, code, options))`
 */
export function fail(code: EasErrorCode, message: string, options?: EasErrorOptions): Failure {
  return err(new EasError(message, code, options));
}

export function mapResult<T, R>(result: EasResult<T>, transform: (data: T) => R): EasResult<R> {
  return result.ok ? ok(transform(result.data)) : result;
}

export async function flatMapResult<T, R>(
  result: EasResult<T>,
  next: (data: T) => Promise<EasResult<R>>
): Promise<EasResult<R>> {
  return result.ok ? next(result.data) : result;
}

/**
 * Replace a failure with a fallback value when `predicate` accepts it
 */
export function recoverResult<T>(
  result: EasResult<T>,
  predicate: (error: EasError) => boolean,
  fallback: T
): EasResult<T> {
  if (!result.ok && predicate(result.error)) {
    return ok(fallback);
  }
  return result;
}

export function getOrElse<T>(result: EasResult<T>, fallback: T): T {
  return result.ok ? result.data : fallback;
}

export function getOrNull<T>(result: EasResult<T>): T | null {
  return result.ok ? result.data : null;
}

export function onSuccess<T>(result: EasResult<T>, action: (data: T) => void): EasResult<T> {
  if (result.ok) {
    action(result.data);
  }
  return result;
}

export function onError<T>(result: EasResult<T>, action: (error: EasError) => void): EasResult<T> {
  if (!result.ok) {
    action(result.error);
  }
  return result;
}
