import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  ConfigurationError,
  createLogger,
  errorMessage,
  ProfileParseError,
  SubjectProfileSchema,
} from '@bridgesim/core';
import type { Logger, SubjectProfile } from '@bridgesim/core';

export const PROFILE_SECTIONS = [
  'basic_info',
  'political_behavior',
  'civic_data',
  'war_position',
  'feeling_thermometer_pre',
  'social_distance_pre',
  'conversation_style',
] as const;

export type ProfileSection = (typeof PROFILE_SECTIONS)[number];

export type RawValue = string | number | boolean | string[];
export type RawSection = Record<string, RawValue>;
export type RawProfile = Partial<Record<ProfileSection, RawSection>>;

const SECTION_HEADER = /^([A-Za-z_][A-Za-z0-9_]*):$/;

function isSection(name: string): name is ProfileSection {
  return PROFILE_SECTIONS.some((s) => s === name);
}

function unquote(s: string): string {
  const q = s[0];
  if ((q === '"' || q === "'") && s.length >= 2 && s.endsWith(q)) {
    return s.slice(1, -1);
  }
  return s;
}

function coerce(value: string): RawValue {
  if (value.startsWith('[') && value.endsWith(']')) {
    return value
      .slice(1, -1)
      .split(',')
      .map((item) => unquote(item.trim()))
      .filter((item) => item.length > 0);
  }
  if (/^\d+$/.test(value)) return Number(value);
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Parse the indentation-based profile text format into its raw sections.
 *
 * ```
 * basic_info:
 *   age: 34
 * conversation_style:
 *   typical_phrases:
 *     - phrase one
 * ```
 */
export function parseProfileText(text: string, source: string): RawProfile {
  const profile: RawProfile = {};
  let current: RawSection | undefined;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i].replace(/\s+$/, '');
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const indented = raw.length !== raw.trimStart().length;
    const header = indented ? null : SECTION_HEADER.exec(line);
    if (header) {
      const name = header[1].toLowerCase();
      if (!isSection(name)) {
        throw new ProfileParseError(`unknown section "${name}"`, source, lineNo);
      }
      current = {};
      profile[name] = current;
      continue;
    }

    if (!current) {
      throw new ProfileParseError('content outside of a section', source, lineNo);
    }

    if (line.startsWith('- ') || line === '-') {
      const lastKey = Object.keys(current).pop();
      if (lastKey === undefined) {
        throw new ProfileParseError('list item without a key', source, lineNo);
      }
      const item = unquote(line.slice(1).trim());
      const existing = current[lastKey];
      if (Array.isArray(existing)) {
        existing.push(item);
      } else if (existing === '') {
        current[lastKey] = [item];
      } else {
        current[lastKey] = [String(existing), item];
      }
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new ProfileParseError(`expected "key: value", got "${line}"`, source, lineNo);
    }
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    current[key] = value === '' ? [] : coerce(value);
  }

  return profile;
}

/** Profile id with its trailing `_profile_<n>` or `_<n>` removed. */
export function groupOf(profileId: string): string {
  return profileId.replace(/(?:_profile)?_\d+$/, '');
}

function text(value: RawValue | undefined, fallback = ''): unknown {
  if (value === undefined) return fallback;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return value;
}

function list(value: RawValue | undefined): unknown {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  return [String(value)];
}

/** Map raw sections to a validated SubjectProfile, filling documented defaults. */
export function toSubjectProfile(id: string, raw: RawProfile, source: string = id): SubjectProfile {
  const basic = raw.basic_info ?? {};
  const political = raw.political_behavior ?? {};
  const civic = raw.civic_data ?? {};
  const war = raw.war_position ?? {};
  const style = raw.conversation_style ?? {};

  const candidate = {
    id,
    group: groupOf(id),
    basicInfo: {
      age: basic['age'] ?? 30,
      gender: text(basic['gender']),
      maritalStatus: text(basic['marital_status']),
      region: text(basic['region']),
      religiosity: basic['religiosity'] ?? 1,
      education: text(basic['education']),
      politicalStance: basic['political_stance'] ?? 3,
    },
    politicalBehavior: {
      lastElectionVote: text(political['last_election_vote']),
      polarizationPerception: text(political['polarization_perception']),
      protestParticipation: text(political['protest_participation']),
      militaryServiceRecent: text(political['military_service_recent']),
      votingFrequency: text(political['voting_frequency']),
      politicalDiscussions: text(political['political_discussions']),
      socialMediaActivity: text(political['social_media_activity']),
    },
    civicData: {
      influenceSources: list(civic['influence_sources']),
      trustPoliticalSystem: civic['trust_political_system'] ?? 5,
      politicalEfficacy: civic['political_efficacy'] ?? 5,
      politicalAnxiety: civic['political_anxiety'] ?? 5,
    },
    warPosition: {
      warPriorityPre: text(war['war_priority_pre']),
      israelActionPre: text(war['israel_action_pre']),
    },
    feelingThermometerPre: raw.feeling_thermometer_pre ?? {},
    socialDistancePre: raw.social_distance_pre ?? {},
    conversationStyle: {
      ...(style['opening_response'] !== undefined && {
        openingResponse: text(style['opening_response']),
      }),
      typicalPhrases: list(style['typical_phrases']),
      tone: text(style['tone']),
    },
  };

  const parsed = SubjectProfileSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new ProfileParseError(`invalid profile (${detail})`, source);
  }
  return parsed.data;
}

/** Profiles shipped with the package. */
export const DEFAULT_PROFILES_DIR = fileURLToPath(new URL('../profiles', import.meta.url));

/** Source of subject profiles for an experiment run. */
export interface ProfileSource {
  listIds(): Promise<string[]>;
  load(id: string): Promise<SubjectProfile>;
}

export interface ProfileLoadFailure {
  profileId: string;
  error: string;
}

export interface ProfileLoadReport {
  profiles: Map<string, SubjectProfile>;
  failures: ProfileLoadFailure[];
}

/**
 * Loads `*.txt` profile files from a directory. The file stem is the profile id.
 */
export class ProfileLoader implements ProfileSource {
  private readonly log: Logger;

  constructor(
    private readonly dir: string,
    options: { logger?: Logger } = {},
  ) {
    this.log = options.logger ?? createLogger('profile-loader');
  }

  async listIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      throw new ConfigurationError(`Cannot read profiles directory ${this.dir}`, 'CONFIGURATION', {
        cause: err,
      });
    }
    return entries
      .filter((name) => name.endsWith('.txt'))
      .map((name) => basename(name, '.txt'))
      .sort();
  }

  async load(id: string): Promise<SubjectProfile> {
    const file = join(this.dir, `${id}.txt`);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Profile "${id}" not found in ${this.dir}`, 'CONFIGURATION', {
        cause: err,
      });
    }
    return toSubjectProfile(id, parseProfileText(content, file), file);
  }

  /** Every loadable profile keyed by id in sorted order, plus the files that failed. */
  async loadEach(): Promise<ProfileLoadReport> {
    const profiles = new Map<string, SubjectProfile>();
    const failures: ProfileLoadFailure[] = [];
    for (const id of await this.listIds()) {
      try {
        profiles.set(id, await this.load(id));
      } catch (err) {
        const error = errorMessage(err);
        this.log.warn({ profileId: id, err: error }, 'Skipping unreadable profile');
        failures.push({ profileId: id, error });
      }
    }
    this.log.debug({ count: profiles.size, failed: failures.length, dir: this.dir }, 'Profiles loaded');
    return { profiles, failures };
  }

  /** Loadable profiles only; unreadable files are skipped with a warning. */
  async loadAll(): Promise<Map<string, SubjectProfile>> {
    return (await this.loadEach()).profiles;
  }

  async byGroup(group: string): Promise<SubjectProfile[]> {
    const all = await this.loadAll();
    return [...all.values()].filter((p) => p.group === group);
  }
}
