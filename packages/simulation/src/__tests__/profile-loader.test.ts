import { copyFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';
import { ConfigurationError, ProfileParseError } from '@bridgesim/core';

import { groupOf, parseProfileText, ProfileLoader, toSubjectProfile } from '../profile-loader.js';
import { tempDir } from './fixtures.js';

const PROFILES_DIR = fileURLToPath(new URL('../../profiles', import.meta.url));

describe('parseProfileText', () => {
  it('parses sections, scalars, inline lists and dash lists', () => {
    const raw = parseProfileText(
      [
        '# comment',
        'basic_info:',
        '  age: 41',
        '  gender: גבר',
        '',
        'civic_data:',
        '  influence_sources: [news, "friends", ]',
        'conversation_style:',
        '  tone: calm',
        '  typical_phrases:',
        '    - one',
        "    - 'two'",
        'social_distance_pre:',
        '  open: true',
      ].join('\n'),
      'inline',
    );

    expect(raw).toEqual({
      basic_info: { age: 41, gender: 'גבר' },
      civic_data: { influence_sources: ['news', 'friends'] },
      conversation_style: { tone: 'calm', typical_phrases: ['one', 'two'] },
      social_distance_pre: { open: true },
    });
  });

  it('promotes a scalar to a list when dash items follow it', () => {
    const raw = parseProfileText('conversation_style:\r\n  phrase: a\r\n  - b\r\n  count: 3\r\n  - x\r\n', 'crlf');
    expect(raw.conversation_style).toEqual({ phrase: ['a', 'b'], count: ['3', 'x'] });
  });

  it('accepts section headers in any case', () => {
    expect(parseProfileText('Basic_Info:\n  age: 5', 'case')).toEqual({ basic_info: { age: 5 } });
  });

  it.each([
    ['an unknown section', 'hobbies:\n  a: b', 'profile.txt:1: unknown section "hobbies"'],
    ['content before any section', '\n  age: 3', 'profile.txt:2: content outside of a section'],
    ['a list item without a key', 'basic_info:\n  - x', 'profile.txt:2: list item without a key'],
    ['a line without a colon', 'basic_info:\n  just text', 'profile.txt:2: expected "key: value", got "just text"'],
  ])('rejects %s with its line number', (_label, text, message) => {
    expect(() => parseProfileText(text, 'profile.txt')).toThrow(ProfileParseError);
    expect(() => parseProfileText(text, 'profile.txt')).toThrow(message);
  });
});

describe('groupOf', () => {
  it('strips the trailing profile number', () => {
    expect(groupOf('center_left_profile_1')).toBe('center_left');
    expect(groupOf('left_2')).toBe('left');
    expect(groupOf('custom')).toBe('custom');
  });
});

describe('toSubjectProfile', () => {
  it('fills defaults for missing fields', () => {
    const profile = toSubjectProfile('right_profile_3', {});

    expect(profile.group).toBe('right');
    expect(profile.basicInfo).toEqual({
      age: 30,
      gender: '',
      maritalStatus: '',
      region: '',
      religiosity: 1,
      education: '',
      politicalStance: 3,
    });
    expect(profile.civicData).toEqual({
      influenceSources: [],
      trustPoliticalSystem: 5,
      politicalEfficacy: 5,
      politicalAnxiety: 5,
    });
    expect(profile.conversationStyle).toEqual({ typicalPhrases: [], tone: '' });
    expect(profile.feelingThermometerPre).toEqual({});
  });

  it('stringifies scalar text fields and wraps a single phrase', () => {
    const profile = toSubjectProfile('left_1', {
      basic_info: { gender: 7 },
      conversation_style: { typical_phrases: 'only one' },
    });
    expect(profile.basicInfo.gender).toBe('7');
    expect(profile.conversationStyle.typicalPhrases).toEqual(['only one']);
  });

  it('rejects an out-of-range political stance', () => {
    expect(() => toSubjectProfile('left_1', { basic_info: { political_stance: 9 } }, 'left_1.txt')).toThrow(
      /^left_1\.txt: invalid profile \(basicInfo\.politicalStance: /,
    );
  });
});

describe('ProfileLoader', () => {
  const loader = new ProfileLoader(PROFILES_DIR);

  it('lists profile ids in sorted order', async () => {
    expect(await loader.listIds()).toEqual([
      'center_left_profile_1',
      'center_profile_1',
      'center_right_profile_1',
      'left_profile_1',
      'left_profile_2',
      'right_profile_1',
    ]);
  });

  it('loads a profile file', async () => {
    const profile = await loader.load('left_profile_1');

    expect(profile.id).toBe('left_profile_1');
    expect(profile.group).toBe('left');
    expect(profile.basicInfo.age).toBe(29);
    expect(profile.basicInfo.politicalStance).toBe(1);
    expect(profile.civicData.influenceSources).toEqual(['עיתונות', 'רשתות חברתיות', 'חברים']);
    expect(profile.feelingThermometerPre).toEqual({ right_voters: 20, left_voters: 85 });
    expect(profile.conversationStyle.typicalPhrases).toHaveLength(3);
    expect(profile.conversationStyle.openingResponse).toBe(
      'אני לא ישנה בלילות בגלל החטופים, כל יום שעובר הוא אסון',
    );
  });

  it('loads every packaged profile and groups them', async () => {
    const all = await loader.loadAll();
    expect([...all.keys()]).toHaveLength(6);

    const left = await loader.byGroup('left');
    expect(left.map((p) => p.id)).toEqual(['left_profile_1', 'left_profile_2']);
  });

  it('loads the readable files and reports the ones that fail to parse', async () => {
    const dir = await tempDir();
    await copyFile(join(PROFILES_DIR, 'left_profile_2.txt'), join(dir, 'left_profile_2.txt'));
    await writeFile(join(dir, 'center_profile_7.txt'), 'hobbies:\n  chess: true\n', 'utf-8');

    const { profiles, failures } = await new ProfileLoader(dir).loadEach();

    expect([...profiles.keys()]).toEqual(['left_profile_2']);
    expect(failures).toEqual([
      { profileId: 'center_profile_7', error: `${join(dir, 'center_profile_7.txt')}:1: unknown section "hobbies"` },
    ]);
  });

  it('reports a missing profile or directory as a configuration error', async () => {
    await expect(loader.load('nobody_1')).rejects.toThrow(ConfigurationError);

    const missing = new ProfileLoader(join(await tempDir(), 'missing'));
    await expect(missing.listIds()).rejects.toThrow(ConfigurationError);
  });
});
