/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export enum LicenseErrorCode {
  /** An override is registered but the file it points to is missing. */
  MISSING_OVERRIDE_FILE = 'MISSING_OVERRIDE_FILE',
  /** No override and no recognized license file in the dependency tree. */
  LICENSE_NOT_FOUND = 'LICENSE_NOT_FOUND',
  /** The third-party root or the primary license path is unusable. */
  ROOT_NOT_FOUND = 'ROOT_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class LicenseError extends Error {
  readonly code: LicenseErrorCode;
  readonly context: Record<string, string>;

  constructor(
    message: string,
    code: LicenseErrorCode,
    context: Record<string, string> = {},
  ) {
    super(message);
    this.name = 'LicenseError';
    this.code = code;
    this.context = context;
  }
}

export function missingOverrideFile(
  dependency: string,
  filePath: string,
): LicenseError {
  return new LicenseError(
    `license override for ${dependency} not found at ${filePath}`,
    LicenseErrorCode.MISSING_OVERRIDE_FILE,
    {dependency, path: filePath},
  );
}

export function licenseNotFound(dependency: string): LicenseError {
  return new LicenseError(
    `license file not found in ${dependency}`,
    LicenseErrorCode.LICENSE_NOT_FOUND,
    {dependency},
  );
}

export function rootNotFound(filePath: string, reason: string): LicenseError {
  return new LicenseError(
    `${filePath} ${reason}`,
    LicenseErrorCode.ROOT_NOT_FOUND,
    {path: filePath},
  );
}
