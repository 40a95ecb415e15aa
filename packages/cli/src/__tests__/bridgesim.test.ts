import { copyFile, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock, MockInstance } from 'vitest';
import { ConfigurationError } from '@bridgesim/core';
import type { Conversation, ProviderName } from '@bridgesim/core';
import { MockMind } from '@bridgesim/mind';
import { ArtifactStore, DEFAULT_PROFILES_DIR, ProfileLoader } from '@bridgesim/simulation';

import { createProgram } from '../bridgesim.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type MindOptions = { provider: ProviderName; model?: string; apiKey?: string };

let mind: MockMind;
let createMind: Mock<(opts: MindOptions) => MockMind>;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

async function runProgram(args: string[]): Promise<void> {
  const program = createProgram({ createMind, sleep: async () => {}, random: () => 0.5 });
  program.exitOverride();
  await program.parseAsync(['node', 'bridgesim', ...args]);
}

function stdout(): string {
  return logSpy.mock.calls.map((args) => args.map(String).join(' ')).join('\n');
}

async function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'bridgesim-cli-'));
}

async function configFile(dir: string, config: unknown): Promise<string> {
  const file = join(dir, 'config.json');
  await writeFile(file, JSON.stringify(config), 'utf-8');
  return file;
}

// Short conversations and a generous per-minute limit keep runs instant.
const FAST = { conversation: { hardLimit: 4 }, rateLimits: { requestsPerMinute: 1_000 } };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('bridgesim CLI', () => {
  beforeEach(() => {
    mind = new MockMind();
    mind.respondWith((_call, n) => `תגובה ${n}`);
    createMind = vi.fn((_opts: MindOptions) => mind);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('run', () => {
    it('runs a test-mode experiment and saves every conversation', async () => {
      const dir = await tempDir();
      const config = await configFile(dir, FAST);

      await runProgram(['run', '--test', '--output-dir', dir, '--config', config]);

      expect(createMind).toHaveBeenCalledWith({ provider: 'gemini', model: undefined, apiKey: undefined });
      expect(await readdir(join(dir, 'conversations'))).toHaveLength(3);
      expect(await readdir(join(dir, 'logs'))).toHaveLength(1);
      expect(mind.calls).toHaveLength(6);

      const out = stdout();
      expect(out).toContain('Provider: mock (mock-model) [test mode]');
      expect(out).toContain('Planned:    3');
      expect(out).toContain('Successful: 3');
      expect(out).toContain('Avg turns:  4.0');
      expect(out).toContain(`Results saved to ${dir}`);
      expect(process.exitCode).toBeUndefined();
    });

    it('passes provider, model and key flags to the provider factory', async () => {
      const dir = await tempDir();
      const config = await configFile(dir, FAST);

      await runProgram([
        'run',
        '--profiles',
        'right_profile_1',
        '--output-dir',
        dir,
        '--config',
        config,
        '--provider',
        'openai',
        '--model',
        'gpt-4o-mini',
        '--api-key',
        'test-key',
      ]);

      expect(createMind).toHaveBeenCalledWith({ provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-key' });
      const names = await readdir(join(dir, 'conversations'));
      expect(names).toHaveLength(3);
      expect(names.every((n) => n.includes('_right_profile_1_'))).toBe(true);
    });

    it('sets a failing exit code when no conversation completes', async () => {
      const dir = await tempDir();
      const config = await configFile(dir, { ...FAST, rateLimits: { requestsPerDay: 1 } });

      await runProgram(['run', '--test', '--output-dir', dir, '--config', config]);

      const out = stdout();
      expect(out).toContain('Successful: 0');
      expect(out).toContain('Aborted:    daily_limit');
      expect(out).toContain('Daily limit reached (1 requests)');
      expect(process.exitCode).toBe(1);
    });

    it('rejects an unknown provider before building a client', async () => {
      const dir = await tempDir();
      await expect(runProgram(['run', '--output-dir', dir, '--provider', 'nope'])).rejects.toThrow(
        'Unknown provider "nope" (expected one of: gemini, openai, anthropic)',
      );
      expect(createMind).not.toHaveBeenCalled();
    });

    it('rejects a selection that matches no profile', async () => {
      const dir = await tempDir();
      await expect(runProgram(['run', '--output-dir', dir, '--profiles', 'nobody_1'])).rejects.toThrow(
        ConfigurationError,
      );
      expect(mind.calls).toHaveLength(0);
    });
  });

  describe('analyze', () => {
    async function seed(dir: string): Promise<void> {
      const profile = await new ProfileLoader(DEFAULT_PROFILES_DIR).load('left_profile_1');
      const at = '2025-01-02T03:04:05.000Z';
      const conversation: Conversation = {
        profileId: profile.id,
        interventionId: 'control',
        turns: [
          { role: 'agent', text: 'מה דעתך על המלחמה?', timestamp: at },
          { role: 'subject', text: 'זה מובן, אבל קשה', timestamp: at },
        ],
        metadata: { startTime: at, endTime: at, messageCount: 2, endingReason: 'hard_limit' },
        profile,
      };
      await new ArtifactStore(dir).saveConversation(conversation);
    }

    it('writes the CSV report and prints the summaries', async () => {
      const dir = await tempDir();
      await seed(dir);

      await runProgram(['analyze', '--results-dir', dir, '--bom']);

      const csv = await readFile(join(dir, 'analysis_results.csv'), 'utf-8');
      expect(csv.startsWith('\uFEFFprofile_id,intervention,')).toBe(true);
      expect(csv.split('\r\n')).toHaveLength(3);

      const out = stdout();
      expect(out).toContain('Conversations: 1');
      expect(out).toContain('By political stance:');
      expect(out).toContain(`CSV written to ${join(dir, 'analysis_results.csv')}`);
    });

    it('honours --output', async () => {
      const dir = await tempDir();
      await seed(dir);
      const output = join(dir, 'reports', 'out.csv');

      await runProgram(['analyze', '--results-dir', dir, '--output', output]);

      const csv = await readFile(output, 'utf-8');
      expect(csv.startsWith('profile_id,')).toBe(true);
    });

    it('fails when there is nothing to analyze', async () => {
      const dir = await tempDir();

      await runProgram(['analyze', '--results-dir', dir]);

      expect(errorSpy).toHaveBeenCalledWith(`No conversations found in ${join(dir, 'conversations')}`);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('profiles', () => {
    it('lists the packaged profiles with group and stance', async () => {
      await runProgram(['profiles']);

      const lines = stdout().split('\n');
      expect(lines).toHaveLength(6);
      expect(lines).toContain(`${'left_profile_1'.padEnd(22)}  ${'left'.padEnd(12)}  1 Left`);
    });

    it('skips a profile file that cannot be parsed and warns about it', async () => {
      const dir = await tempDir();
      await copyFile(join(DEFAULT_PROFILES_DIR, 'left_profile_1.txt'), join(dir, 'left_profile_1.txt'));
      await writeFile(join(dir, 'right_profile_9.txt'), 'stray line\n', 'utf-8');

      await runProgram(['profiles', '--profiles-dir', dir]);

      expect(stdout()).toBe(`left_profile_1  ${'left'.padEnd(12)}  1 Left`);
      expect(errorSpy).toHaveBeenCalledWith(
        `Skipping right_profile_9: ${join(dir, 'right_profile_9.txt')}:1: content outside of a section`,
      );
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe('status', () => {
    it('prints the configured ceilings', async () => {
      const dir = await tempDir();
      const config = await configFile(dir, { rateLimits: { requestsPerMinute: 7 } });

      await runProgram(['status', '--config', config]);

      expect(stdout()).toBe(
        [
          'Requests/day:    0/1500',
          'Requests/minute: 0/7',
          'Tokens/minute:   0/4000000',
          'Can request:     yes',
        ].join('\n'),
      );
    });
  });
});
