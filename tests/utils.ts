/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Creates `files` (relative path to contents) under `root`. A path ending in
 * `/` creates an empty directory.
 */
export function writeTree(root: string, files: Record<string, string>) {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    if (relativePath.endsWith('/')) {
      fs.mkdirSync(target, {recursive: true});
      continue;
    }
    fs.mkdirSync(path.dirname(target), {recursive: true});
    fs.writeFileSync(target, contents);
  }
}

export async function withTempDir(
  cb: (dir: string) => Promise<void> | void,
): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'third-party-licenses-'));
  try {
    await cb(dir);
  } finally {
    fs.rmSync(dir, {recursive: true, force: true});
  }
}
