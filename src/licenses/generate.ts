/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {aggregateLicenses, type AggregateOptions} from './aggregator.js';
import type {LicenseConfig} from './config.js';
import type {LicenseError} from './errors.js';
import type {Result} from './result.js';
import type {AggregatedDocument} from './types.js';
import {writeLicenseDocument, type LicenseWriter} from './writer.js';

export interface GenerateOptions extends AggregateOptions {
  outputFile: string;
}

/**
 * Aggregates and writes the license file. The writer only runs once every
 * dependency has resolved, so a failed run leaves `outputFile` as it was.
 */
export function generateLicenseFile(
  options: GenerateOptions,
  config: LicenseConfig,
  writer: LicenseWriter = writeLicenseDocument,
): Result<AggregatedDocument, LicenseError> {
  const document = aggregateLicenses(options, config);
  if (document.ok) {
    writer(document.value, options.outputFile);
  }
  return document;
}
