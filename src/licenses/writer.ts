/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import path from 'node:path';

import {logger} from '../logger.js';

import type {AggregatedDocument} from './types.js';

export type LicenseWriter = (
  document: AggregatedDocument,
  outputFile: string,
) => void;

export const writeLicenseDocument: LicenseWriter = (document, outputFile) => {
  fs.mkdirSync(path.dirname(outputFile), {recursive: true});
  fs.writeFileSync(outputFile, document.text, 'utf8');
  logger(`Wrote ${document.blocks.length} license blocks to ${outputFile}`);
};
