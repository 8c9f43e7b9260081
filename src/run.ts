/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {ParsedArguments} from './cli.js';
import {
  generateLicenseFile,
  loadLicenseConfig,
  type LicenseWriter,
} from './licenses/index.js';
import {logger} from './logger.js';

/**
 * Runs one aggregation and returns the process exit code.
 */
export function run(args: ParsedArguments, writer?: LicenseWriter): number {
  const config = loadLicenseConfig(args.config);
  if (!config.ok) {
    console.error(`error: ${config.error.message}`);
    return 1;
  }

  const result = generateLicenseFile(
    {
      primaryLicense: args.primaryLicense,
      thirdPartyDir: args.thirdPartyDir,
      outputFile: args.outputFile,
    },
    args.title ? {...config.value, primaryTitle: args.title} : config.value,
    writer,
  );
  if (!result.ok) {
    logger('Run failed', result.error.code, result.error.context);
    console.error(`error: ${result.error.message}`);
    return 1;
  }
  return 0;
}
