/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Outcome of a pipeline step. Failures are returned rather than thrown so the
 * caller decides when a run stops.
 */
export type Result<T, E> = {ok: true; value: T} | {ok: false; error: E};

export function ok<T>(value: T): {ok: true; value: T} {
  return {ok: true, value};
}

export function err<E>(error: E): {ok: false; error: E} {
  return {ok: false, error};
}
