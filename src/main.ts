#!/usr/bin/env node

/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import process from 'node:process';

import {parseArguments} from './cli.js';
import {flushLogs, logger, saveLogsToFile} from './logger.js';
import {run} from './run.js';
import {VERSION} from './version.js';

const args = parseArguments(VERSION);

const logFile = args.logFile ? saveLogsToFile(args.logFile) : undefined;

logger(`Starting third-party-licenses v${VERSION}`);

try {
  process.exitCode = run(args);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  logger('Unexpected failure', error);
  console.error(`error: ${message}`);
  process.exitCode = 1;
} finally {
  if (logFile) {
    await flushLogs(logFile);
  }
}
