/**
 * Pipeline Orchestrator
 *
 * Document flow: normalize → recognize → classify/extract → translate.
 * Explanation flow: cached text and insights → explanation gateway.
 *
 * Both flows can run on the TaskRunner so the caller's turn is never
 * blocked; `submitDocument` / `submitExplanation` wrap them that way. With a
 * WorkerNormalizer the pixel work runs on its own thread, OCR runs in the
 * tesseract.js worker and the remaining stages are asynchronous I/O, so the
 * calling thread only sequences them.
 */

import {
  DOCUMENT_TYPE_LABELS,
  DocumentType,
  NO_TEXT_DETECTED,
  type DocumentImage,
  type Insight,
  type PipelineResult,
} from '../../types/document.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { DocumentNormalizer } from '../image-processing/WorkerNormalizer.js';
import type { TextRecognizer } from '../content-processing/OCRService.js';
import type { DocumentClassifier } from '../analysis/DocumentClassifier.js';
import { dedupeInsights, type TermExtractor } from '../analysis/TermExtractor.js';
import type { TranslationGateway } from '../translation/TranslationGateway.js';
import type { ExplanationGateway } from '../llm/ExplanationGateway.js';
import type { TaskHandle, TaskRunner } from './TaskRunner.js';

export const DEFAULT_LOCAL_DEFINITION = 'Medical term found in document.';

export interface ProcessOptions {
  targetLanguage: string;
  highContrast?: boolean;
  /** OCR language hint (default: eng) */
  languageHint?: string;
}

export interface PipelineDependencies {
  normalizer: DocumentNormalizer;
  recognizer: TextRecognizer;
  classifier: DocumentClassifier;
  extractor: TermExtractor;
  translator: TranslationGateway;
  explainer: ExplanationGateway;
  runner: TaskRunner;
}

/**
 * Result delivered by the runner when a run fails outside every stage boundary
 */
export interface PipelineFailure {
  message: string;
}

export type DocumentRunResult = PipelineResult | PipelineFailure;

export function isPipelineFailure(value: DocumentRunResult): value is PipelineFailure {
  return 'message' in value;
}

const log = createChildLogger({ component: 'PipelineOrchestrator' });

export class PipelineOrchestrator {
  private cachedText = '';
  private cachedInsights: Insight[] = [];

  constructor(private readonly deps: PipelineDependencies) {}

  getCachedText(): string {
    return this.cachedText;
  }

  getCachedInsights(): readonly Insight[] {
    return this.cachedInsights;
  }

  reset(): void {
    this.cachedText = '';
    this.cachedInsights = [];
  }

  async processDocument(image: DocumentImage, options: ProcessOptions): Promise<PipelineResult> {
    const { targetLanguage, highContrast = false, languageHint = 'eng' } = options;
    const startTime = Date.now();

    const normalization = await this.deps.normalizer.normalize(image, highContrast);
    log.debug(
      { skewAngle: normalization.skewAngle, deskewed: normalization.deskewed, stages: normalization.stages },
      'Image normalized'
    );

    const recognition = await this.deps.recognizer.recognize(normalization.image, languageHint);
    if (recognition.status !== 'ok') {
      this.cachedText = '';
      this.cachedInsights = [];
      const translatedDocument =
        recognition.status === 'no-text' ? NO_TEXT_DETECTED : `Error reading document: ${recognition.message}`;
      log.info({ status: recognition.status }, 'No text to process');
      return {
        translatedDocument,
        documentType: DocumentType.General,
        documentTypeLabel: DOCUMENT_TYPE_LABELS[DocumentType.General],
        insightList: [],
        rawText: '',
        textDetected: false,
        skewAngle: normalization.skewAngle,
        targetLanguage,
      };
    }

    const rawText = recognition.text;
    const documentType = this.deps.classifier.classify(rawText);
    const insights = dedupeInsights(this.deps.extractor.extractInsights(rawText));
    const insightList = await this.translateInsights(insights, targetLanguage);
    const translatedDocument = await this.deps.translator.translateOrError(rawText, targetLanguage);

    this.cachedText = rawText;
    this.cachedInsights = insightList;

    log.info(
      { documentType, insights: insightList.length, targetLanguage, durationMs: Date.now() - startTime },
      'Document processed'
    );

    return {
      translatedDocument,
      documentType,
      documentTypeLabel: DOCUMENT_TYPE_LABELS[documentType],
      insightList,
      rawText,
      textDetected: true,
      skewAngle: normalization.skewAngle,
      targetLanguage,
    };
  }

  /**
   * Translated titles and descriptions are best effort: on failure the
   * insights are returned untranslated.
   */
  private async translateInsights(insights: Insight[], targetLanguage: string): Promise<Insight[]> {
    const result: Insight[] = [];
    for (const insight of insights) {
      try {
        const translatedTitle = await this.deps.translator.translate(insight.title, targetLanguage);
        const translatedDescription = await this.deps.translator.translate(insight.description, targetLanguage);
        result.push({ ...insight, translatedTitle, translatedDescription });
      } catch (error) {
        log.warn({ error: getErrorMessage(error), targetLanguage }, 'Insight translation unavailable');
        return insights.map((item) => ({ ...item }));
      }
    }
    return result;
  }

  async explainTerm(term: string, targetLanguage: string): Promise<string> {
    const match = this.cachedInsights.find((insight) => insight.title === term);
    const localDefinition = match ? match.description : DEFAULT_LOCAL_DEFINITION;
    return this.deps.explainer.explain(term, localDefinition, this.cachedText, targetLanguage);
  }

  submitDocument(image: DocumentImage, options: ProcessOptions): TaskHandle<DocumentRunResult> {
    return this.deps.runner.submit<DocumentRunResult>('process-document', async () => {
      try {
        return await this.processDocument(image, options);
      } catch (error) {
        log.error({ error: getErrorMessage(error) }, 'Document pipeline failed');
        return { message: `Error: ${getErrorMessage(error)}` };
      }
    });
  }

  submitExplanation(term: string, targetLanguage: string): TaskHandle<string> {
    return this.deps.runner.submit('explain-term', () => this.explainTerm(term, targetLanguage));
  }
}
