/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Keep in sync with package.json.
export const VERSION = '0.1.0';
