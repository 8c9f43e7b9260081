/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import assert from 'node:assert';
import {describe, it} from 'node:test';

import {checkPositionals, parseArguments} from '../src/cli.js';

describe('cli args parsing', () => {
  it('parses the three positional paths', async () => {
    const args = parseArguments('1.0.0', [
      'node',
      'main.js',
      'LICENSE',
      'third_party',
      'out/LICENSES.txt',
    ]);
    assert.deepStrictEqual(args, {
      primaryLicense: 'LICENSE',
      thirdPartyDir: 'third_party',
      outputFile: 'out/LICENSES.txt',
    });
  });

  it('keeps numeric paths as strings', async () => {
    const args = parseArguments('1.0.0', [
      'node',
      'main.js',
      'LICENSE',
      'third_party',
      '2024',
    ]);
    assert.strictEqual(args.outputFile, '2024');
  });

  it('parses config and title', async () => {
    const args = parseArguments('1.0.0', [
      'node',
      'main.js',
      'LICENSE',
      'third_party',
      'LICENSES.txt',
      '--config',
      'licenses.json',
      '--title',
      'My Project',
    ]);
    assert.deepStrictEqual(args, {
      primaryLicense: 'LICENSE',
      thirdPartyDir: 'third_party',
      outputFile: 'LICENSES.txt',
      config: 'licenses.json',
      title: 'My Project',
    });
  });

  it('parses short aliases', async () => {
    const args = parseArguments('1.0.0', [
      'node',
      'main.js',
      '-c',
      'licenses.json',
      '-t',
      'Other',
      'LICENSE',
      'third_party',
      'LICENSES.txt',
    ]);
    assert.strictEqual(args.config, 'licenses.json');
    assert.strictEqual(args.title, 'Other');
    assert.strictEqual(args.primaryLicense, 'LICENSE');
  });

  it('parses log file', async () => {
    const args = parseArguments('1.0.0', [
      'node',
      'main.js',
      'LICENSE',
      'third_party',
      'LICENSES.txt',
      '--logFile',
      '/tmp/licenses.log',
    ]);
    assert.strictEqual(args.logFile, '/tmp/licenses.log');
  });

  it('accepts an empty primary license', async () => {
    assert.deepStrictEqual(checkPositionals(['', 'third_party', 'out.txt']), [
      '',
      'third_party',
      'out.txt',
    ]);
  });

  it('reports an empty third-party dir with a readable message', async () => {
    assert.throws(() => checkPositionals(['LICENSE', '', 'out.txt']), {
      message: 'third-party-dir must not be empty',
    });
  });

  it('reports empty paths together', async () => {
    assert.throws(() => checkPositionals(['LICENSE', '', '']), {
      message:
        'third-party-dir must not be empty; output-file must not be empty',
    });
  });
});
