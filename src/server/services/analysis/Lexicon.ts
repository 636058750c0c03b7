/**
 * Lexicon
 *
 * Two read-only mappings used by the term extractor:
 * - primary: curated term → insight template (small, hand written)
 * - backup: diagnosis code → description (large, matched by substring)
 *
 * A Lexicon is built once and injected; it is frozen so no caller can mutate
 * the shared value after construction.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import type { InsightCategory } from '../../types/document.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export interface InsightTemplate {
  readonly title: string;
  readonly description: string;
  readonly category: InsightCategory;
}

export interface BackupEntry {
  readonly code: string;
  readonly description: string;
}

export interface Lexicon {
  readonly primary: ReadonlyMap<string, InsightTemplate>;
  /** Sorted by code so capped matching is deterministic */
  readonly backup: ReadonlyArray<BackupEntry>;
}

export interface LexiconPaths {
  primaryPath: string;
  backupPath: string;
}

const DEFAULT_PRIMARY: Record<string, InsightTemplate> = {
  mg: { title: 'Milligrams', description: 'Dosage unit', category: 'info' },
};

const primaryEntrySchema = z.object({
  title: z.string().min(1),
  desc: z.string(),
  type: z.enum(['info', 'warning', 'drug']),
});

const backupObjectSchema = z.object({
  code: z.string().min(1),
  description: z.string().min(1),
});

const backupPairSchema = z.tuple([z.string().min(1), z.string().min(1)]).rest(z.unknown());

const log = createChildLogger({ component: 'Lexicon' });

/**
 * Build a frozen lexicon from in-memory values.
 */
export function createLexicon(
  primary: Record<string, InsightTemplate>,
  backup: Iterable<BackupEntry> = []
): Lexicon {
  const primaryMap = new Map<string, InsightTemplate>();
  for (const [term, template] of Object.entries(primary)) {
    const key = term.trim().toLowerCase();
    if (!key || primaryMap.has(key)) continue;
    primaryMap.set(key, Object.freeze({ ...template }));
  }

  const seenCodes = new Set<string>();
  const backupEntries: BackupEntry[] = [];
  for (const entry of backup) {
    if (seenCodes.has(entry.code)) continue;
    seenCodes.add(entry.code);
    backupEntries.push(Object.freeze({ code: entry.code, description: entry.description }));
  }
  backupEntries.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));

  return Object.freeze({
    primary: primaryMap,
    backup: Object.freeze(backupEntries),
  });
}

/**
 * Parse the primary glossary file content: `term -> { title, desc, type }`.
 * The `_meta` key and invalid entries are skipped.
 */
export function parsePrimaryLexicon(raw: unknown): Record<string, InsightTemplate> {
  const result: Record<string, InsightTemplate> = {};
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return result;
  }

  for (const [term, value] of Object.entries(raw)) {
    if (term === '_meta') continue;
    const parsed = primaryEntrySchema.safeParse(value);
    if (!parsed.success) {
      log.warn({ term }, 'Skipping invalid primary lexicon entry');
      continue;
    }
    result[term] = {
      title: parsed.data.title,
      description: parsed.data.desc,
      category: parsed.data.type,
    };
  }
  return result;
}

/**
 * Parse the backup glossary file content. Accepts a list of
 * `{ code, description }` objects, a list of `[code, description]` pairs,
 * or a plain `code -> description` object.
 */
export function parseBackupLexicon(raw: unknown): BackupEntry[] {
  const entries: BackupEntry[] = [];

  if (Array.isArray(raw)) {
    for (const item of raw) {
      const asObject = backupObjectSchema.safeParse(item);
      if (asObject.success) {
        entries.push({ code: asObject.data.code, description: asObject.data.description });
        continue;
      }
      const asPair = backupPairSchema.safeParse(item);
      if (asPair.success) {
        entries.push({ code: asPair.data[0], description: asPair.data[1] });
      }
    }
    return entries;
  }

  if (raw && typeof raw === 'object') {
    for (const [code, description] of Object.entries(raw)) {
      if (typeof description === 'string' && description.length > 0) {
        entries.push({ code, description });
      }
    }
  }
  return entries;
}

async function readJson(path: string): Promise<unknown | undefined> {
  try {
    const content = await fs.readFile(path, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Load both lexicons from disk. A missing primary file falls back to a
 * minimal built-in entry; a missing backup file yields an empty backup.
 * Unreadable or malformed files are logged and treated the same way.
 */
export async function loadLexicon(paths: LexiconPaths): Promise<Lexicon> {
  let primary: Record<string, InsightTemplate> = DEFAULT_PRIMARY;
  try {
    const raw = await readJson(paths.primaryPath);
    if (raw === undefined) {
      log.warn({ path: paths.primaryPath }, 'Primary lexicon not found, using built-in default');
    } else {
      primary = parsePrimaryLexicon(raw);
      log.info({ terms: Object.keys(primary).length }, 'Primary lexicon loaded');
    }
  } catch (error) {
    log.error({ error: getErrorMessage(error), path: paths.primaryPath }, 'Primary lexicon error');
  }

  let backup: BackupEntry[] = [];
  try {
    const raw = await readJson(paths.backupPath);
    if (raw === undefined) {
      log.warn({ path: paths.backupPath }, 'Backup lexicon not found');
    } else {
      backup = parseBackupLexicon(raw);
      log.info({ codes: backup.length }, 'Backup lexicon loaded');
    }
  } catch (error) {
    log.error({ error: getErrorMessage(error), path: paths.backupPath }, 'Backup lexicon error');
  }

  return createLexicon(primary, backup);
}
