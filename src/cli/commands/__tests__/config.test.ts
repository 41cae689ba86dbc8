/**
 * Tests for the config command
 *
 * Runs the subcommands against a config file in a temp STUDYDESK_HOME.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { join } from 'node:path';
import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { _clearEnvCache } from '../../../config/env.js';
import { makeTempDir, removeDir } from '../../../test-utils/index.js';

// eslint-disable-next-line no-control-regex
const plain = (text: string): string => text.replace(/\x1B\[[0-9;]*m/g, '');

describe('createConfigCommand', () => {
  let dir: string;
  let logOutput: string[];
  let errorOutput: string[];
  let json: boolean;
  let consoleLogSpy: MockInstance<typeof console.log>;

  const context = (): CommandContext => ({
    options: { verbose: false, json },
    log: (msg: string) => logOutput.push(plain(msg)),
    debug: vi.fn(),
    warn: vi.fn(),
    error: (msg: string) => errorOutput.push(plain(msg)),
  });

  async function run(...args: string[]): Promise<void> {
    await createConfigCommand(context).parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    dir = makeTempDir();
    vi.stubEnv('STUDYDESK_HOME', dir);
    _clearEnvCache();
    logOutput = [];
    errorOutput = [];
    json = false;
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    _clearEnvCache();
    process.exitCode = undefined;
    removeDir(dir);
  });

  it('creates the config command', () => {
    const cmd = createConfigCommand(context);
    expect(cmd.name()).toBe('config');
    expect(cmd.commands.map((c) => c.name())).toEqual(['get', 'set', 'list', 'path', 'reset']);
  });

  describe('get', () => {
    it('prints a default value', async () => {
      await run('get', 'ai.model');
      expect(logOutput).toEqual(['gemini-2.0-flash']);
    });

    it('reports an unknown key', async () => {
      await run('get', 'ai.colour');

      expect(errorOutput).toEqual(['Unknown config key: ai.colour']);
      expect(process.exitCode).toBe(1);
    });

    it('prints JSON with --json', async () => {
      json = true;
      await run('get', 'pomodoro.work_minutes');

      expect(consoleLogSpy).toHaveBeenCalledWith('{"key":"pomodoro.work_minutes","value":25}');
    });
  });

  describe('set', () => {
    it('writes the value and reads it back', async () => {
      await run('set', 'pomodoro.work_minutes', '50');
      await run('get', 'pomodoro.work_minutes');

      expect(logOutput).toEqual(['✓ Set pomodoro.work_minutes = 50', '50']);
    });

    it('rejects an unknown key', async () => {
      await run('set', 'ai.colour', 'red');

      expect(errorOutput).toEqual(["Unknown config key 'ai.colour'"]);
      expect(process.exitCode).toBe(2);
    });

    it('rejects a value the schema does not accept', async () => {
      await run('set', 'pomodoro.work_minutes', 'lots');

      expect(errorOutput[0]?.startsWith("Invalid value for 'pomodoro.work_minutes':")).toBe(true);
      expect(process.exitCode).toBe(2);
    });
  });

  describe('list', () => {
    it('groups keys by section and names the file', async () => {
      await run('list');

      expect(logOutput.slice(0, 4)).toEqual(['Configuration:', '', '  ai.model = gemini-2.0-flash', '  ai.base_url = https://generativelanguage.googleapis.com/v1beta']);
      expect(logOutput).toContain('  pomodoro.work_minutes = 25');
      expect(logOutput.at(-1)).toBe(`Config file: ${join(dir, 'config.toml')}`);
    });
  });

  it('prints the config path', async () => {
    await run('path');
    expect(logOutput).toEqual([join(dir, 'config.toml')]);
  });

  describe('reset', () => {
    it('asks for --force', async () => {
      await run('reset');

      expect(logOutput).toEqual([
        'This will reset all configuration to defaults.',
        'Run with --force to confirm.',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('rewrites the defaults with --force', async () => {
      await run('set', 'pomodoro.work_minutes', '50');
      await run('reset', '--force');
      await run('get', 'pomodoro.work_minutes');

      expect(logOutput.slice(-2)).toEqual(['✓ Configuration reset to defaults', '25']);
    });
  });
});

describe('formatValue', () => {
  it('prints scalars plainly and objects as JSON', () => {
    expect(formatValue('text')).toBe('text');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(30000)).toBe('30000');
    expect(formatValue({ path: '/tmp/a.db' })).toBe('{"path":"/tmp/a.db"}');
  });
});
