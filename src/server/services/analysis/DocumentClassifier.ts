import { DocumentType } from '../../types/document.js';

interface ClassificationRule {
  type: DocumentType;
  keywords: readonly string[];
}

/**
 * Checked in order; the first rule with any keyword present wins.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { type: DocumentType.Prescription, keywords: ['rx', 'prescription', 'pharmacy', 'take', 'daily', 'tablet'] },
  { type: DocumentType.LabReport, keywords: ['lab', 'metabolic', 'count', 'positive', 'negative', 'range', 'result'] },
  { type: DocumentType.DischargeSummary, keywords: ['discharge', 'summary', 'admitted', 'hospital', 'instructions'] },
  { type: DocumentType.ClinicalNote, keywords: ['diagnosis', 'history', 'assessment', 'plan'] },
];

export class DocumentClassifier {
  constructor(private readonly rules: readonly ClassificationRule[] = CLASSIFICATION_RULES) {}

  /**
   * Keyword matching is plain substring search, so "rx" also hits inside
   * longer words.
   */
  classify(text: string): DocumentType {
    const lower = text.toLowerCase();
    for (const rule of this.rules) {
      if (rule.keywords.some((keyword) => lower.includes(keyword))) {
        return rule.type;
      }
    }
    return DocumentType.General;
  }
}
