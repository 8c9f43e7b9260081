/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';

import {logger} from '../logger.js';
import {zod} from '../third_party/index.js';

import {LicenseError, LicenseErrorCode} from './errors.js';
import {err, ok, type Result} from './result.js';

/**
 * Dependency name to a license file path, relative to the third-party root,
 * that is read instead of searching the dependency's tree.
 */
export type LicenseOverrides = Readonly<Record<string, string>>;

export interface LicenseConfig {
  /** Directories under the root that are tooling, not dependencies. */
  readonly pruneDirs: readonly string[];
  /** Prefix of scratch directories left behind by the dependency fetcher. */
  readonly tempDirPrefix: string;
  /** Exact file names recognized as a license. */
  readonly licenseFilenames: readonly string[];
  readonly overrides: LicenseOverrides;
  /** Title of the block holding the project's own license. */
  readonly primaryTitle: string;
}

export const DEFAULT_LICENSE_CONFIG: LicenseConfig = {
  pruneDirs: ['chromium_build', 'config', 'llvm-build', 'ninja'],
  tempDirPrefix: '_gclient_',
  licenseFilenames: [
    'LICENSE',
    'LICENSE.md',
    'LICENSE.rst',
    'COPYING',
    'COPYING.txt',
  ],
  overrides: {
    lss: 'LICENSE.lss',
    zlib: 'LICENSE.zlib',
  },
  primaryTitle: 'Goma Client',
};

export const licenseConfigSchema = zod
  .object({
    pruneDirs: zod.array(zod.string().min(1)).optional(),
    tempDirPrefix: zod.string().min(1).optional(),
    licenseFilenames: zod.array(zod.string().min(1)).nonempty().optional(),
    overrides: zod.record(zod.string().min(1)).optional(),
    primaryTitle: zod.string().min(1).optional(),
  })
  .strict();

export type LicenseConfigFile = zod.infer<typeof licenseConfigSchema>;

/**
 * Keys present in `file` replace the defaults wholesale; lists are not
 * merged.
 */
export function resolveLicenseConfig(
  file: LicenseConfigFile = {},
  base: LicenseConfig = DEFAULT_LICENSE_CONFIG,
): LicenseConfig {
  return {
    pruneDirs: file.pruneDirs ?? base.pruneDirs,
    tempDirPrefix: file.tempDirPrefix ?? base.tempDirPrefix,
    licenseFilenames: file.licenseFilenames ?? base.licenseFilenames,
    overrides: file.overrides ?? base.overrides,
    primaryTitle: file.primaryTitle ?? base.primaryTitle,
  };
}

function invalidConfig(configPath: string, reason: string): LicenseError {
  return new LicenseError(
    `invalid config ${configPath}: ${reason}`,
    LicenseErrorCode.INVALID_CONFIG,
    {path: configPath},
  );
}

export function loadLicenseConfig(
  configPath?: string,
): Result<LicenseConfig, LicenseError> {
  if (!configPath) {
    return ok(DEFAULT_LICENSE_CONFIG);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidConfig(configPath, message));
  }

  const parsed = licenseConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return err(invalidConfig(configPath, reason));
  }

  logger(`Loaded license config from ${configPath}`);
  return ok(resolveLicenseConfig(parsed.data));
}
