import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ReportService, pairParagraphs } from './ReportService.js';
import type { ReportPayload } from '../../types/document.js';

const payload: ReportPayload = {
  originalText: 'Take 1 tablet daily.\n\nAmoxicillin 500 mg.',
  translatedText: 'Tome 1 tableta al día.\n\nAmoxicilina 500 mg.',
  insights: [
    {
      title: 'Milligrams',
      description: 'Dosage unit',
      category: 'info',
      translatedTitle: 'Miligramos',
      translatedDescription: 'Unidad de dosis',
    },
  ],
  documentType: 'Prescription / Medication List',
  language: 'Spanish',
};

describe('pairParagraphs', () => {
  it('pairs lines by index and drops rows blank on both sides', () => {
    expect(pairParagraphs('a\n\nb\nc', 'x\n \ny')).toEqual([
      { original: 'a', translated: 'x' },
      { original: 'b', translated: 'y' },
      { original: 'c', translated: '' },
    ]);
  });

  it('keeps rows with text on one side only', () => {
    expect(pairParagraphs('', 'solo')).toEqual([{ original: '', translated: 'solo' }]);
  });
});

describe('ReportService', () => {
  const service = new ReportService({ fontDir: path.join(os.tmpdir(), 'no-fonts-here') });

  it('renders a PDF with a dated file name', async () => {
    const report = await service.generateReport(payload);

    expect(report.buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(report.mimeType).toBe('application/pdf');
    expect(report.filename).toMatch(/^meditranslate-report-\d{4}-\d{2}-\d{2}\.pdf$/);
  });

  it('renders Hindi reports without the Devanagari font', async () => {
    const report = await service.generateReport({ ...payload, language: 'Hindi', insights: [] });
    expect(report.buffer.length).toBeGreaterThan(0);
  });

  it('paginates long documents', async () => {
    const longText = Array.from({ length: 200 }, (_, i) => `Line ${i} of the discharge instructions.`).join('\n');
    const single = await service.generateReport({ ...payload, originalText: 'one line', translatedText: 'una línea' });
    const long = await service.generateReport({ ...payload, originalText: longText, translatedText: longText });

    const pageCount = (buffer: Buffer) => buffer.toString('latin1').match(/\/Type \/Page\b/g)?.length ?? 0;
    expect(pageCount(single.buffer)).toBe(1);
    expect(pageCount(long.buffer)).toBeGreaterThan(1);
  });

  it('writes the report to disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-'));
    const target = path.join(dir, 'out.pdf');

    await service.writeReport(target, payload);

    const written = await fs.readFile(target);
    expect(written.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    await fs.rm(dir, { recursive: true, force: true });
  });
});
