import type { Insight } from '../../types/document.js';

export interface PatternRule {
  pattern: RegExp;
  insight: Insight;
}

export const PATTERN_RULES: readonly PatternRule[] = [
  {
    pattern: /\b\d{2,3}\/\d{2,3}\b/,
    insight: {
      title: 'Blood Pressure',
      description: 'Systolic/Diastolic readings. Normal is ~120/80.',
      category: 'warning',
    },
  },
  {
    pattern: /\b(99\.[5-9]|1\d{2}(\.\d)?)\s*F\b|\b(3[7-9](\.\d)?|4\d(\.\d)?)\s*C\b/i,
    insight: {
      title: 'Fever Detected',
      description: 'High body temperature detected.',
      category: 'warning',
    },
  },
  {
    pattern: /\btake\s+\d+(\.\d)?\s+(tablets|pills|capsules)/i,
    insight: {
      title: 'Dosage Instruction',
      description: 'Specific instruction on how many pills to take.',
      category: 'info',
    },
  },
];
