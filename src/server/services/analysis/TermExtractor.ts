/**
 * Term Extractor
 *
 * Layered matching over OCR text:
 * 1. primary lexicon, whole-word
 * 2. pattern rules (vitals, dosage instructions)
 * 3. backup code lexicon, literal substring, capped
 *
 * Output keeps discovery order and never holds two insights whose titles
 * differ only by case.
 */

import type { Insight } from '../../types/document.js';
import type { Lexicon } from './Lexicon.js';
import { PATTERN_RULES, type PatternRule } from './patternRules.js';

export const BACKUP_MATCH_LIMIT = 3;
export const BACKUP_MIN_DESCRIPTION_LENGTH = 5;
export const BACKUP_INSIGHT_DESCRIPTION = 'Medical diagnosis detected via International Database.';

export interface TermExtractorOptions {
  patternRules?: readonly PatternRule[];
  backupLimit?: number;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Upper-case the first letter of every alphabetic run, lower-case the rest.
 */
export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|\P{L})(\p{L})/gu, (_match, prefix: string, letter: string) => {
    return prefix + letter.toUpperCase();
  });
}

/**
 * Drop later insights whose title repeats an earlier one, ignoring case.
 */
export function dedupeInsights(insights: readonly Insight[]): Insight[] {
  const seen = new Set<string>();
  const result: Insight[] = [];
  for (const insight of insights) {
    const key = insight.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(insight);
  }
  return result;
}

export class TermExtractor {
  private readonly primaryMatchers: Array<{ term: string; pattern: RegExp }>;
  private readonly patternRules: readonly PatternRule[];
  private readonly backupLimit: number;

  constructor(private readonly lexicon: Lexicon, options: TermExtractorOptions = {}) {
    this.primaryMatchers = [...lexicon.primary.keys()].map((term) => ({
      term,
      pattern: new RegExp(`\\b${escapeRegExp(term)}\\b`),
    }));
    this.patternRules = options.patternRules ?? PATTERN_RULES;
    this.backupLimit = options.backupLimit ?? BACKUP_MATCH_LIMIT;
  }

  extractInsights(text: string): Insight[] {
    const lower = text.toLowerCase();
    const insights: Insight[] = [];
    const seenTitles = new Set<string>();
    const foundTerms: string[] = [];

    const emit = (insight: Insight): boolean => {
      const key = insight.title.toLowerCase();
      if (seenTitles.has(key)) return false;
      seenTitles.add(key);
      insights.push(insight);
      return true;
    };

    for (const { term, pattern } of this.primaryMatchers) {
      const template = this.lexicon.primary.get(term);
      if (!template || !pattern.test(lower)) continue;
      foundTerms.push(term);
      emit({ title: template.title, description: template.description, category: template.category });
    }

    for (const rule of this.patternRules) {
      if (rule.pattern.test(text)) {
        emit({ ...rule.insight });
      }
    }

    let backupMatches = 0;
    for (const entry of this.lexicon.backup) {
      if (backupMatches >= this.backupLimit) break;
      const description = entry.description.toLowerCase();
      if (description.length < BACKUP_MIN_DESCRIPTION_LENGTH || !lower.includes(description)) continue;
      // A more specific primary term or earlier diagnosis already covers it
      if (foundTerms.some((found) => description.includes(found))) continue;

      const added = emit({
        title: `${toTitleCase(entry.description)} (${entry.code})`,
        description: BACKUP_INSIGHT_DESCRIPTION,
        category: 'warning',
      });
      if (added) {
        foundTerms.push(description);
        backupMatches++;
      }
    }

    return insights;
  }
}
