import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { ConversationSchema, createLogger, errorMessage } from '@bridgesim/core';
import type { Conversation, ExperimentResult, Logger } from '@bridgesim/core';

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local-time `YYYYMMDD_HHMMSS`, used in artifact file names. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface ArtifactStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Writes conversation artifacts and experiment logs as pretty-printed UTF-8 JSON:
 *
 *   <outputDir>/conversations/<ts>_<profileId>_<interventionId>.json
 *   <outputDir>/logs/experiment_log_<ts>.json
 */
export class ArtifactStore {
  readonly conversationsDir: string;
  readonly logsDir: string;

  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly outputDir: string,
    options: ArtifactStoreOptions = {},
  ) {
    this.conversationsDir = join(outputDir, 'conversations');
    this.logsDir = join(outputDir, 'logs');
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('artifact-store');
  }

  async saveConversation(conversation: Conversation): Promise<string> {
    const name = `${fileTimestamp(this.now())}_${conversation.profileId}_${conversation.interventionId}.json`;
    const file = join(this.conversationsDir, name);
    await this.writeJson(file, conversation);
    this.log.info({ file }, 'Conversation saved');
    return file;
  }

  async saveExperimentLog(result: ExperimentResult): Promise<string> {
    const file = join(this.logsDir, `experiment_log_${fileTimestamp(this.now())}.json`);
    await this.writeJson(file, result);
    this.log.info({ file }, 'Experiment log saved');
    return file;
  }

  /**
   * Read every conversation artifact, in file-name order. Files that are not
   * valid conversations are skipped with a warning.
   */
  async loadConversations(): Promise<Conversation[]> {
    let names: string[];
    try {
      names = await readdir(this.conversationsDir);
    } catch (err) {
      this.log.warn({ dir: this.conversationsDir, err: errorMessage(err) }, 'No conversations directory');
      return [];
    }

    const conversations: Conversation[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const file = join(this.conversationsDir, name);
      try {
        const parsed = ConversationSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
        if (parsed.success) {
          conversations.push(parsed.data);
        } else {
          this.log.warn({ file, issues: parsed.error.issues.length }, 'Skipping invalid conversation');
        }
      } catch (err) {
        this.log.warn({ file, err: errorMessage(err) }, 'Skipping unreadable conversation');
      }
    }
    return conversations;
  }

  private async writeJson(file: string, value: unknown): Promise<void> {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  }
}
