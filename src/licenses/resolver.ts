/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import path from 'node:path';

import {logger} from '../logger.js';

import type {LicenseConfig} from './config.js';
import {
  licenseNotFound,
  missingOverrideFile,
  type LicenseError,
} from './errors.js';
import {err, ok, type Result} from './result.js';
import {compareNames} from './scanner.js';
import type {ThirdPartyDependency} from './types.js';

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger(`Cannot stat ${filePath}: ${message}`);
    return false;
  }
}

/**
 * Returns the path of the first file named like a license under `dir`.
 *
 * The tree is walked breadth-first. Files of a directory are checked in
 * sorted order before any of its subdirectories, which are queued in sorted
 * order too, so the pick does not depend on how the file system lists
 * entries. Symlinked directories are not followed.
 */
export function findLicenseFile(
  dir: string,
  licenseFilenames: readonly string[],
): string | undefined {
  const queue = [dir];
  for (let current = queue.shift(); current; current = queue.shift()) {
    const entries = fs
      .readdirSync(current, {withFileTypes: true})
      .sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
      if (!licenseFilenames.includes(entry.name)) {
        continue;
      }
      const candidate = path.join(current, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && isFile(candidate))) {
        return candidate;
      }
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        queue.push(path.join(current, entry.name));
      }
    }
  }
  return undefined;
}

/**
 * Produces the license text of one dependency.
 *
 * A registered override is read from `root` and never falls back to
 * searching. Empty license files are treated as missing.
 */
export function resolveLicense(
  dependency: ThirdPartyDependency,
  root: string,
  config: Pick<LicenseConfig, 'overrides' | 'licenseFilenames'>,
): Result<string, LicenseError> {
  const override = Object.hasOwn(config.overrides, dependency.name)
    ? config.overrides[dependency.name]
    : undefined;

  let licensePath: string | undefined;
  if (override !== undefined) {
    licensePath = path.join(root, override);
    if (!isFile(licensePath)) {
      return err(missingOverrideFile(dependency.name, licensePath));
    }
  } else {
    licensePath = findLicenseFile(dependency.path, config.licenseFilenames);
  }

  if (!licensePath) {
    return err(licenseNotFound(dependency.name));
  }

  const contents = fs.readFileSync(licensePath, 'utf8');
  if (!contents) {
    logger(`${licensePath} is empty`);
    return err(licenseNotFound(dependency.name));
  }

  logger(`Resolved license of ${dependency.name} from ${licensePath}`);
  return ok(contents);
}
