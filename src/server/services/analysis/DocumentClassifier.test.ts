import { describe, it, expect } from 'vitest';
import { DocumentType } from '../../types/document.js';
import { DocumentClassifier } from './DocumentClassifier.js';

describe('DocumentClassifier', () => {
  const classifier = new DocumentClassifier();

  it.each([
    ['Rx: Amoxicillin 500 mg', DocumentType.Prescription],
    ['Comprehensive Metabolic Panel', DocumentType.LabReport],
    ['Patient was ADMITTED on Monday', DocumentType.DischargeSummary],
    ['Assessment and follow up', DocumentType.ClinicalNote],
    ['Appointment card', DocumentType.General],
  ])('classifies "%s"', (text, expected) => {
    expect(classifier.classify(text)).toBe(expected);
  });

  it('prefers the higher-priority type when several match', () => {
    expect(classifier.classify('Lab result: take one tablet daily')).toBe(DocumentType.Prescription);
    expect(classifier.classify('Discharge summary with lab values')).toBe(DocumentType.LabReport);
  });

  it('matches keywords inside longer words', () => {
    expect(classifier.classify('Mistake in billing')).toBe(DocumentType.Prescription);
  });

  it('returns General for empty text', () => {
    expect(classifier.classify('')).toBe(DocumentType.General);
  });
});
