import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { Command } from 'commander';
import { ConfigurationError, ProviderNameSchema, sleep as timerSleep } from '@bridgesim/core';
import type { ProviderName, RunConfig, Sleep } from '@bridgesim/core';
import { createMind } from '@bridgesim/mind';
import type { Mind } from '@bridgesim/mind';
import {
  ArtifactStore,
  ConversationSimulator,
  DEFAULT_PROFILES_DIR,
  ExperimentController,
  loadRunConfig,
  MetricsAnalyzer,
  ProfileLoader,
  RateLimiter,
  toCsv,
} from '@bridgesim/simulation';

import {
  formatAnalysis,
  formatBalance,
  formatExperimentSummary,
  formatLimiterStatus,
  formatProfiles,
} from './report-formatter.js';

const DEFAULT_RESULTS_DIR = 'results';
const CSV_FILE = 'analysis_results.csv';

/** Seams the tests replace; production uses the real provider client and timers. */
export interface CliDeps {
  createMind?: (opts: { provider: ProviderName; model?: string; apiKey?: string }) => Mind;
  sleep?: Sleep;
  random?: () => number;
}

interface RunOpts {
  test?: boolean;
  profiles?: string[];
  outputDir: string;
  profilesDir: string;
  config?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
}

interface AnalyzeOpts {
  resultsDir: string;
  output?: string;
  bom?: boolean;
}

function resolveProvider(flag: string | undefined, config: RunConfig): ProviderName {
  if (flag === undefined) return config.provider;
  const parsed = ProviderNameSchema.safeParse(flag);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown provider "${flag}" (expected one of: ${ProviderNameSchema.options.join(', ')})`,
    );
  }
  return parsed.data;
}

export function createProgram(deps: CliDeps = {}): Command {
  const buildMind = deps.createMind ?? createMind;
  const sleep = deps.sleep ?? timerSleep;
  const random = deps.random ?? Math.random;

  const program = new Command();
  program
    .name('bridgesim')
    .description('Simulated political dialogues for testing depolarization interventions')
    .version('0.1.0');

  // ----- run -----

  program
    .command('run')
    .description('Run every profile × intervention conversation and save the artifacts')
    .option('--test', 'Test mode: a few profiles and at most a handful of conversations', false)
    .option('--profiles <ids...>', 'Run only these profile ids')
    .option('--output-dir <dir>', 'Directory for conversations and logs', DEFAULT_RESULTS_DIR)
    .option('--profiles-dir <dir>', 'Directory of profile .txt files', DEFAULT_PROFILES_DIR)
    .option('--config <file>', 'JSON run configuration')
    .option('--provider <name>', 'Completion provider: gemini, openai or anthropic')
    .option('--model <name>', 'Model name (defaults per provider)')
    .option('--api-key <key>', 'Provider API key (defaults to the provider environment variable)')
    .action(async (opts: RunOpts) => {
      const config = await loadRunConfig(opts.config);
      const provider = resolveProvider(opts.provider, config);
      const mind = buildMind({ provider, model: opts.model ?? config.model, apiKey: opts.apiKey });

      const rateLimiter = new RateLimiter({ config: config.rateLimits, sleep });
      const store = new ArtifactStore(resolve(opts.outputDir));
      const simulator = new ConversationSimulator({
        mind,
        rateLimiter,
        store,
        config: config.conversation,
        random,
        sleep,
      });
      const controller = new ExperimentController({
        simulator,
        rateLimiter,
        profiles: new ProfileLoader(resolve(opts.profilesDir)),
        store,
        config: config.experiment,
        random,
        sleep,
      });

      console.log(`Provider: ${mind.provider} (${mind.model})${opts.test ? ' [test mode]' : ''}`);
      const result = await controller.runExperiment({ testMode: opts.test, profileIds: opts.profiles });

      console.log('');
      console.log(formatExperimentSummary(result));
      console.log('');
      console.log(formatBalance(controller.validateBalance(result)));
      console.log('');
      console.log(`Results saved to ${store.outputDir}`);

      if (result.successful.length === 0) {
        process.exitCode = 1;
      }
    });

  // ----- analyze -----

  program
    .command('analyze')
    .description('Score saved conversations and write a CSV report')
    .option('--results-dir <dir>', 'Directory the run wrote its artifacts to', DEFAULT_RESULTS_DIR)
    .option('--output <csv>', `CSV output file (default: <results-dir>/${CSV_FILE})`)
    .option('--bom', 'Prefix the CSV with a UTF-8 byte order mark', false)
    .action(async (opts: AnalyzeOpts) => {
      const resultsDir = resolve(opts.resultsDir);
      const analyzer = await MetricsAnalyzer.create();
      const { rows, summaries, byStance } = await analyzer.analyzeDirectory(resultsDir);

      if (rows.length === 0) {
        console.error(`No conversations found in ${join(resultsDir, 'conversations')}`);
        process.exitCode = 1;
        return;
      }

      const output = resolve(opts.output ?? join(resultsDir, CSV_FILE));
      await mkdir(dirname(output), { recursive: true });
      await writeFile(output, toCsv(rows, { bom: opts.bom }), 'utf-8');

      console.log(formatAnalysis(rows.length, summaries, byStance));
      console.log('');
      console.log(`CSV written to ${output}`);
    });

  // ----- profiles -----

  program
    .command('profiles')
    .description('List loadable subject profiles')
    .option('--profiles-dir <dir>', 'Directory of profile .txt files', DEFAULT_PROFILES_DIR)
    .action(async (opts: { profilesDir: string }) => {
      const { profiles, failures } = await new ProfileLoader(resolve(opts.profilesDir)).loadEach();
      for (const failure of failures) {
        console.error(`Skipping ${failure.profileId}: ${failure.error}`);
      }
      console.log(formatProfiles([...profiles.values()]));
    });

  // ----- status -----

  program
    .command('status')
    .description('Show the configured rate-limit ceilings')
    .option('--config <file>', 'JSON run configuration')
    .action(async (opts: { config?: string }) => {
      const config = await loadRunConfig(opts.config);
      console.log(formatLimiterStatus(new RateLimiter({ config: config.rateLimits }).getStatus()));
    });

  return program;
}
