/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface ThirdPartyDependency {
  /** Directory name; unique within a run. */
  name: string;
  path: string;
}

export interface LicenseBlock {
  title: string;
  body: string;
}

export interface AggregatedDocument {
  blocks: LicenseBlock[];
  text: string;
}
