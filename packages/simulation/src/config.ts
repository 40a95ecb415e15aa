import { readFile } from 'node:fs/promises';

import { ConfigurationError, errorMessage, RunConfigSchema } from '@bridgesim/core';
import type { RunConfig } from '@bridgesim/core';

/**
 * Load a run configuration from a JSON file, filling every omitted field with
 * its default. Without a file the defaults alone are returned.
 */
export async function loadRunConfig(file?: string): Promise<RunConfig> {
  if (!file) return RunConfigSchema.parse({});

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${file}: ${errorMessage(err)}`, 'CONFIGURATION', {
      cause: err,
    });
  }

  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${file}: ${details}`);
  }
  return parsed.data;
}
