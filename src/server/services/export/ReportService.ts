/**
 * Report Service
 *
 * Renders a bilingual PDF: original and translated text side by side,
 * followed by the medical insights in both languages.
 */

import PDFDocument from 'pdfkit';
import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { ReportPayload } from '../../types/document.js';
import { getLanguage } from '../../config/languages.js';
import { getEnv } from '../../config/env.js';
import { createChildLogger } from '../../utils/logger.js';

export interface ReportResult {
  buffer: Buffer;
  filename: string;
  mimeType: string;
}

export interface ReportServiceConfig {
  fontDir?: string;
}

export interface ParagraphPair {
  original: string;
  translated: string;
}

const FONT_FILES = {
  latin: 'NotoSans-Regular.ttf',
  devanagari: 'NotoSansDevanagari-Regular.ttf',
} as const;

const DEFAULT_FONT = 'Helvetica';
const DEFAULT_BOLD_FONT = 'Helvetica-Bold';
const MARGIN = 50;
const COLUMN_WIDTH = 230;
const COLUMN_GAP = 20;

const log = createChildLogger({ component: 'ReportService' });

/**
 * Line up original and translated paragraphs by index; rows blank on both
 * sides are dropped.
 */
export function pairParagraphs(original: string, translated: string): ParagraphPair[] {
  const left = original.split('\n');
  const right = translated.split('\n');
  const pairs: ParagraphPair[] = [];
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const o = left[i] ?? '';
    const t = right[i] ?? '';
    if (!o.trim() && !t.trim()) continue;
    pairs.push({ original: o, translated: t });
  }
  return pairs;
}

export class ReportService {
  private readonly fontDir: string;

  constructor(config: ReportServiceConfig = {}) {
    this.fontDir = config.fontDir ?? getEnv().REPORT_FONT_DIR;
  }

  async generateReport(payload: ReportPayload): Promise<ReportResult> {
    return new Promise((resolve, reject) => {
      try {
        const doc = new PDFDocument({ margin: MARGIN, size: 'LETTER' });
        const chunks: Buffer[] = [];

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => {
          resolve({
            buffer: Buffer.concat(chunks),
            filename: `meditranslate-report-${new Date().toISOString().split('T')[0]}.pdf`,
            mimeType: 'application/pdf',
          });
        });
        doc.on('error', reject);

        this.generatePDFContent(doc, payload);

        doc.end();
      } catch (error) {
        log.error({ error }, 'Failed to generate PDF report');
        reject(error);
      }
    });
  }

  async writeReport(filepath: string, payload: ReportPayload): Promise<void> {
    const { buffer } = await this.generateReport(payload);
    await fs.writeFile(filepath, buffer);
    log.info({ filepath, bytes: buffer.length }, 'Report written');
  }

  /**
   * Register bundled fonts; returns the font names for body and translated text
   */
  private registerFonts(doc: PDFKit.PDFDocument, language: string): { body: string; translated: string } {
    const fonts = { body: DEFAULT_FONT, translated: DEFAULT_FONT };

    const latinPath = path.join(this.fontDir, FONT_FILES.latin);
    if (existsSync(latinPath)) {
      doc.registerFont('Latin', latinPath);
      fonts.body = 'Latin';
      fonts.translated = 'Latin';
    }

    if (getLanguage(language)?.script === 'devanagari') {
      const devanagariPath = path.join(this.fontDir, FONT_FILES.devanagari);
      if (existsSync(devanagariPath)) {
        doc.registerFont('Devanagari', devanagariPath);
        fonts.translated = 'Devanagari';
      } else {
        log.warn({ fontDir: this.fontDir }, 'Devanagari font missing, translated text may not render');
      }
    }

    return fonts;
  }

  private generatePDFContent(doc: PDFKit.PDFDocument, payload: ReportPayload): void {
    const fonts = this.registerFonts(doc, payload.language);
    const documentType = payload.documentType || 'Unknown';
    const language = payload.language || 'English';

    doc.font(DEFAULT_BOLD_FONT).fontSize(20).text('MediTranslate Report');
    doc.moveDown(0.5);
    doc.font(fonts.body).fontSize(11).text(`Type: ${documentType} | Language: ${language}`);
    doc.moveDown(1.5);

    doc.fontSize(10);
    this.writeRow(doc, { original: 'ORIGINAL TEXT', translated: language.toUpperCase() }, DEFAULT_BOLD_FONT, DEFAULT_BOLD_FONT);
    for (const pair of pairParagraphs(payload.originalText, payload.translatedText)) {
      this.writeRow(doc, pair, fonts.body, fonts.translated);
    }

    if (payload.insights.length === 0) {
      return;
    }

    doc.moveDown(2);
    doc.x = MARGIN;
    doc.font(DEFAULT_BOLD_FONT).fontSize(16).text('Medical Insights');
    doc.moveDown(0.5);
    doc.fontSize(10);

    for (const insight of payload.insights) {
      this.writeRow(
        doc,
        { original: insight.title, translated: insight.translatedTitle ?? insight.title },
        DEFAULT_BOLD_FONT,
        fonts.translated
      );
      this.writeRow(
        doc,
        { original: insight.description, translated: insight.translatedDescription ?? insight.description },
        fonts.body,
        fonts.translated
      );
      doc.moveDown(0.5);
    }
  }

  /**
   * Two-column row; starts a new page when the taller cell would not fit
   */
  private writeRow(doc: PDFKit.PDFDocument, pair: ParagraphPair, leftFont: string, rightFont: string): void {
    const leftX = MARGIN;
    const rightX = MARGIN + COLUMN_WIDTH + COLUMN_GAP;

    doc.font(leftFont);
    const leftHeight = doc.heightOfString(pair.original || ' ', { width: COLUMN_WIDTH });
    doc.font(rightFont);
    const rightHeight = doc.heightOfString(pair.translated || ' ', { width: COLUMN_WIDTH });
    const rowHeight = Math.max(leftHeight, rightHeight);

    if (doc.y + rowHeight > doc.page.height - MARGIN) {
      doc.addPage();
    }

    const top = doc.y;
    doc.font(leftFont).text(pair.original, leftX, top, { width: COLUMN_WIDTH });
    doc.font(rightFont).text(pair.translated, rightX, top, { width: COLUMN_WIDTH });
    doc.x = MARGIN;
    doc.y = top + rowHeight + 6;
  }
}
