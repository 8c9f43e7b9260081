/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import process from 'node:process';

import type {YargsOptions} from './third_party/index.js';
import {hideBin, yargs, zod} from './third_party/index.js';

export const cliOptions = {
  config: {
    type: 'string',
    alias: 'c',
    description:
      'JSON file overriding the prune list, temporary directory prefix, license file names, overrides or primary title.',
  },
  title: {
    type: 'string',
    alias: 't',
    description:
      'Title of the block holding the primary license. Takes precedence over the config file.',
  },
  logFile: {
    type: 'string',
    description:
      'Path to a file to write debug logs to. Set the env variable `DEBUG` to `*` to enable verbose logs.',
  },
} satisfies Record<string, YargsOptions>;

// An empty primary license means there is none, as with a missing file.
const positionalsSchema = zod.tuple([
  zod.string(),
  zod.string().min(1, 'third-party-dir must not be empty'),
  zod.string().min(1, 'output-file must not be empty'),
]);

/**
 * Validates the positional paths; throws an `Error` with a readable message
 * for yargs to report.
 */
export function checkPositionals(
  positionals: ReadonlyArray<string | number>,
): [string, string, string] {
  const result = positionalsSchema.safeParse(positionals.map(String));
  if (!result.success) {
    throw new Error(result.error.issues.map(issue => issue.message).join('; '));
  }
  return result.data;
}

export interface ParsedArguments {
  primaryLicense: string;
  thirdPartyDir: string;
  outputFile: string;
  config?: string;
  title?: string;
  logFile?: string;
}

export function parseArguments(
  version: string,
  argv = process.argv,
): ParsedArguments {
  const yargsInstance = yargs(hideBin(argv))
    .scriptName('third-party-licenses')
    .usage('$0 <primary-license> <third-party-dir> <output-file>')
    .parserConfiguration({'parse-positional-numbers': false})
    .options(cliOptions)
    .demandCommand(
      3,
      3,
      'Expected <primary-license> <third-party-dir> <output-file>',
      'Expected <primary-license> <third-party-dir> <output-file>',
    )
    .strictOptions()
    .check(args => {
      checkPositionals(args._);
      return true;
    })
    .example([
      [
        '$0 LICENSE third_party out/LICENSES.txt',
        'Combine LICENSE with the license of every directory in third_party',
      ],
      [
        '$0 LICENSE third_party out/LICENSES.txt --config licenses.json',
        'Use the prune list and overrides from licenses.json',
      ],
      [
        '$0 LICENSE third_party out/LICENSES.txt --title "My Project"',
        'Title the primary license block "My Project"',
      ],
    ]);

  const args = yargsInstance
    .wrap(Math.min(120, yargsInstance.terminalWidth()))
    .help()
    .version(version)
    .parseSync();

  const [primaryLicense, thirdPartyDir, outputFile] = checkPositionals(
    args._,
  );

  const parsed: ParsedArguments = {primaryLicense, thirdPartyDir, outputFile};
  if (args.config !== undefined) {
    parsed.config = args.config;
  }
  if (args.title !== undefined) {
    parsed.title = args.title;
  }
  if (args.logFile !== undefined) {
    parsed.logFile = args.logFile;
  }
  return parsed;
}
