import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createLexicon, loadLexicon, parseBackupLexicon, parsePrimaryLexicon } from './Lexicon.js';

describe('parsePrimaryLexicon', () => {
  it('maps entries and skips _meta and invalid ones', () => {
    const parsed = parsePrimaryLexicon({
      _meta: { version: 1 },
      mg: { title: 'Milligrams', desc: 'Unit', type: 'info' },
      broken: { title: 'Broken', desc: 'No type' },
    });

    expect(parsed).toEqual({ mg: { title: 'Milligrams', description: 'Unit', category: 'info' } });
  });

  it('returns nothing for non-object input', () => {
    expect(parsePrimaryLexicon(['mg'])).toEqual({});
  });
});

describe('parseBackupLexicon', () => {
  it('accepts a list of objects', () => {
    expect(parseBackupLexicon([{ code: 'I10', description: 'Essential hypertension' }])).toEqual([
      { code: 'I10', description: 'Essential hypertension' },
    ]);
  });

  it('accepts a list of pairs', () => {
    expect(parseBackupLexicon([['J45.9', 'Asthma', 'extra'], ['bad']])).toEqual([{ code: 'J45.9', description: 'Asthma' }]);
  });

  it('accepts a code-to-description object', () => {
    expect(parseBackupLexicon({ R51: 'Headache', R05: '' })).toEqual([{ code: 'R51', description: 'Headache' }]);
  });
});

describe('createLexicon', () => {
  it('lower-cases terms, sorts backup codes and freezes the result', () => {
    const lexicon = createLexicon(
      { MG: { title: 'Milligrams', description: 'Unit', category: 'info' } },
      [
        { code: 'J45.9', description: 'Asthma' },
        { code: 'I10', description: 'Essential hypertension' },
        { code: 'I10', description: 'Duplicate' },
      ]
    );

    expect([...lexicon.primary.keys()]).toEqual(['mg']);
    expect(lexicon.backup.map((entry) => entry.code)).toEqual(['I10', 'J45.9']);
    expect(lexicon.backup[0].description).toBe('Essential hypertension');
    expect(Object.isFrozen(lexicon)).toBe(true);
    expect(Object.isFrozen(lexicon.backup)).toBe(true);
  });
});

describe('loadLexicon', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexicon-'));
    await fs.writeFile(
      path.join(dir, 'primary.json'),
      JSON.stringify({ _meta: {}, fever: { title: 'Fever', desc: 'High body temp.', type: 'warning' } })
    );
    await fs.writeFile(path.join(dir, 'backup.json'), JSON.stringify([['R51', 'Headache']]));
    await fs.writeFile(path.join(dir, 'broken.json'), '{ not json');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads both files', async () => {
    const lexicon = await loadLexicon({
      primaryPath: path.join(dir, 'primary.json'),
      backupPath: path.join(dir, 'backup.json'),
    });

    expect(lexicon.primary.get('fever')).toEqual({ title: 'Fever', description: 'High body temp.', category: 'warning' });
    expect(lexicon.backup).toEqual([{ code: 'R51', description: 'Headache' }]);
  });

  it('falls back to the built-in entry and an empty backup when files are missing', async () => {
    const lexicon = await loadLexicon({
      primaryPath: path.join(dir, 'missing.json'),
      backupPath: path.join(dir, 'missing-too.json'),
    });

    expect([...lexicon.primary.keys()]).toEqual(['mg']);
    expect(lexicon.backup).toEqual([]);
  });

  it('treats a malformed file like a missing one', async () => {
    const lexicon = await loadLexicon({
      primaryPath: path.join(dir, 'broken.json'),
      backupPath: path.join(dir, 'broken.json'),
    });

    expect(lexicon.primary.get('mg')?.title).toBe('Milligrams');
    expect(lexicon.backup).toEqual([]);
  });
});
