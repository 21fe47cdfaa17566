import type { CommandError } from './errors.js';

export interface Success<T> {
  readonly type: 'success';
  readonly data: T;
}

/** A value or a tagged error; the error defaults to {@link CommandError} */
export type Result<T, E extends { readonly type: string } = CommandError> = Success<T> | E;

export function ok<T>(data: T): Success<T> {
  return { type: 'success', data };
}

// Helper functions
export function isSuccess<T, E extends { readonly type: string }>(r: Result<T, E>): r is Success<T> {
  return r.type === 'success';
}

export function isError<T, E extends { readonly type: string }>(r: Result<T, E>): r is E {
  return r.type !== 'success';
}
