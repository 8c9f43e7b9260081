/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import process from 'node:process';

import {debug} from './third_party/index.js';

const licensesDebugNamespace = 'licenses:log';

const namespacesToEnable = [
  licensesDebugNamespace,
  ...(process.env['DEBUG'] ? [process.env['DEBUG']] : []),
];

export function saveLogsToFile(fileName: string): fs.WriteStream {
  // `enable` replaces whatever DEBUG selected, so keep those namespaces too.
  debug.enable(namespacesToEnable.join(','));

  const logFile = fs.createWriteStream(fileName, {flags: 'a'});
  debug.log = function (...chunks: unknown[]) {
    logFile.write(`${chunks.join(' ')}\n`);
  };
  logFile.on('error', function (error) {
    console.error(`Error when opening/writing to log file: ${error.message}`);
    logFile.end();
    process.exit(1);
  });
  return logFile;
}

export function flushLogs(
  logFile: fs.WriteStream,
  timeoutMs = 2000,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Timeout: log file not flushed within ${timeoutMs}ms`));
    }, timeoutMs);
    logFile.end(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

export const logger = debug(licensesDebugNamespace);
