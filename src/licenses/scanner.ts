/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import path from 'node:path';

import {logger} from '../logger.js';

import type {LicenseConfig} from './config.js';
import {rootNotFound, type LicenseError} from './errors.js';
import {err, ok, type Result} from './result.js';
import type {ThirdPartyDependency} from './types.js';

/**
 * Orders by Unicode code point, independent of the host locale. Plain `<`
 * compares UTF-16 code units, which puts astral characters before U+E000 to
 * U+FFFF.
 */
export function compareNames(a: string, b: string): number {
  const left = Array.from(a, char => char.codePointAt(0) ?? 0);
  const right = Array.from(b, char => char.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return Math.sign(left.length - right.length);
}

/**
 * Follows symlinks. Entries that cannot be stat'ed (dangling or looping
 * links, unreadable entries) are not directories.
 */
function isDirectory(entryPath: string): boolean {
  try {
    return fs.statSync(entryPath).isDirectory();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger(`Cannot stat ${entryPath}: ${message}`);
    return false;
  }
}

export function isExcludedDir(
  name: string,
  config: Pick<LicenseConfig, 'pruneDirs' | 'tempDirPrefix'>,
): boolean {
  return (
    config.pruneDirs.includes(name) || name.startsWith(config.tempDirPrefix)
  );
}

/**
 * Lists the dependency directories directly under `root`, sorted by name.
 */
export function scanThirdPartyDir(
  root: string,
  config: Pick<LicenseConfig, 'pruneDirs' | 'tempDirPrefix'>,
): Result<ThirdPartyDependency[], LicenseError> {
  const rootStat = fs.statSync(root, {throwIfNoEntry: false});
  if (!rootStat) {
    return err(rootNotFound(root, 'does not exist'));
  }
  if (!rootStat.isDirectory()) {
    return err(rootNotFound(root, 'is not a directory'));
  }

  const dependencies: ThirdPartyDependency[] = [];
  for (const name of fs.readdirSync(root).sort(compareNames)) {
    const dependencyPath = path.join(root, name);
    if (!isDirectory(dependencyPath)) {
      continue;
    }
    if (isExcludedDir(name, config)) {
      logger(`Skipping ${name}`);
      continue;
    }
    dependencies.push({name, path: dependencyPath});
  }

  logger(`Found ${dependencies.length} third-party directories in ${root}`);
  return ok(dependencies);
}
