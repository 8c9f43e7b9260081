/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';

import {logger} from '../logger.js';

import type {LicenseConfig} from './config.js';
import {rootNotFound, type LicenseError} from './errors.js';
import {resolveLicense} from './resolver.js';
import {err, ok, type Result} from './result.js';
import {scanThirdPartyDir} from './scanner.js';
import type {AggregatedDocument, LicenseBlock} from './types.js';

export interface AggregateOptions {
  /** The project's own license. Omitted from the output when missing. */
  primaryLicense: string;
  thirdPartyDir: string;
}

export function renderLicenseBlock(block: LicenseBlock): string {
  return `${block.title}\n${'='.repeat(block.title.length)}\n${block.body}`;
}

export function renderLicenseBlocks(blocks: readonly LicenseBlock[]): string {
  return blocks.map(renderLicenseBlock).join('\n\n');
}

function readPrimaryLicense(
  primaryLicense: string,
  title: string,
): Result<LicenseBlock | undefined, LicenseError> {
  if (!primaryLicense) {
    logger('No primary license given');
    return ok(undefined);
  }
  const stat = fs.statSync(primaryLicense, {throwIfNoEntry: false});
  if (!stat) {
    logger(`No primary license at ${primaryLicense}`);
    return ok(undefined);
  }
  if (!stat.isFile()) {
    return err(rootNotFound(primaryLicense, 'is not a file'));
  }
  return ok({title, body: fs.readFileSync(primaryLicense, 'utf8')});
}

/**
 * Builds the combined license document. Stops at the first dependency whose
 * license cannot be resolved; nothing after it is read.
 */
export function aggregateLicenses(
  options: AggregateOptions,
  config: LicenseConfig,
): Result<AggregatedDocument, LicenseError> {
  const dependencies = scanThirdPartyDir(options.thirdPartyDir, config);
  if (!dependencies.ok) {
    return dependencies;
  }

  const primary = readPrimaryLicense(
    options.primaryLicense,
    config.primaryTitle,
  );
  if (!primary.ok) {
    return primary;
  }

  const blocks: LicenseBlock[] = primary.value ? [primary.value] : [];
  for (const dependency of dependencies.value) {
    const license = resolveLicense(dependency, options.thirdPartyDir, config);
    if (!license.ok) {
      logger(`Aborting: ${license.error.message}`);
      return license;
    }
    blocks.push({title: dependency.name, body: license.value});
  }

  return ok({blocks, text: renderLicenseBlocks(blocks)});
}
