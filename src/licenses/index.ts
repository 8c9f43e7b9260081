/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './aggregator.js';
export * from './config.js';
export * from './errors.js';
export * from './generate.js';
export * from './resolver.js';
export * from './result.js';
export * from './scanner.js';
export * from './types.js';
export * from './writer.js';
