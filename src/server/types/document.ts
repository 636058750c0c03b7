/**
 * Core document types shared by the scanning pipeline.
 */

/**
 * Number of interleaved channels in a pixel buffer.
 * 1 = grayscale, 3 = RGB, 4 = RGBA.
 */
export type ChannelCount = 1 | 3 | 4;

/**
 * Raw pixel buffer, row-major and interleaved.
 *
 * A buffer has a single owner at a time: pipeline stages allocate a new
 * buffer for their output and never write into their input.
 */
export interface DocumentImage {
  data: Uint8Array;
  width: number;
  height: number;
  channels: ChannelCount;
}

/**
 * Single-channel working image used inside the normalizer.
 */
export interface GrayImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export interface StageReport {
  stage: NormalizationStage;
  status: 'applied' | 'skipped' | 'failed';
  detail?: string;
}

export type NormalizationStage = 'grayscale' | 'denoise' | 'contrast' | 'deskew' | 'expand';

export interface NormalizationResult {
  /** Always 3 channels, same width and height as the input */
  image: DocumentImage;
  /** Median line angle in degrees measured before correction (0 when no lines were found) */
  skewAngle: number;
  deskewed: boolean;
  stages: StageReport[];
}

export enum DocumentType {
  Prescription = 'Prescription',
  LabReport = 'LabReport',
  DischargeSummary = 'DischargeSummary',
  ClinicalNote = 'ClinicalNote',
  General = 'General',
}

export const DOCUMENT_TYPE_LABELS: Record<DocumentType, string> = {
  [DocumentType.Prescription]: 'Prescription / Medication List',
  [DocumentType.LabReport]: 'Laboratory Report',
  [DocumentType.DischargeSummary]: 'Discharge Summary',
  [DocumentType.ClinicalNote]: 'Clinical Note',
  [DocumentType.General]: 'General Medical Document',
};

export type InsightCategory = 'info' | 'warning' | 'drug';

export interface Insight {
  title: string;
  description: string;
  category: InsightCategory;
  translatedTitle?: string;
  translatedDescription?: string;
}

/**
 * Outcome of a text-recognition call.
 * `no-text` is kept apart from an empty string so later stages can tell
 * "nothing extracted" from "translation of nothing".
 */
export type RecognitionResult =
  | { status: 'ok'; text: string }
  | { status: 'no-text' }
  | { status: 'error'; message: string };

export const NO_TEXT_DETECTED = '[No text detected. Try enhancing the image.]';

export interface PipelineResult {
  translatedDocument: string;
  documentType: DocumentType;
  documentTypeLabel: string;
  insightList: Insight[];
  rawText: string;
  textDetected: boolean;
  skewAngle: number;
  targetLanguage: string;
}

export interface ReportPayload {
  originalText: string;
  translatedText: string;
  insights: Insight[];
  documentType: string;
  language: string;
}
