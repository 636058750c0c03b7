/**
 * Image Normalizer
 *
 * Prepares a photographed or scanned page for OCR:
 * grayscale → denoise → contrast (CLAHE or Otsu) → deskew → 3 channels.
 *
 * `normalize` never throws. A failing stage logs a warning and hands its
 * input to the next stage unchanged.
 */

import type {
  DocumentImage,
  GrayImage,
  NormalizationResult,
  NormalizationStage,
  StageReport,
} from '../../types/document.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { createBlankImage, toGrayscale, grayToRgb, toRgb } from './channels.js';
import { applyClahe, binarizeOtsu, type ClaheOptions } from './contrast.js';
import { nonLocalMeansDenoise, type DenoiseOptions } from './denoise.js';
import { deskew, type DeskewOptions } from './deskew.js';

export interface ImageNormalizerConfig {
  denoise?: DenoiseOptions;
  clahe?: ClaheOptions;
  deskew?: DeskewOptions;
}

const log = createChildLogger({ component: 'ImageNormalizer' });

export class ImageNormalizer {
  private readonly config: ImageNormalizerConfig;

  constructor(config: ImageNormalizerConfig = {}) {
    this.config = config;
  }

  normalize(image: DocumentImage, highContrastMode: boolean): NormalizationResult {
    const stages: StageReport[] = [];

    const gray = this.runStage(stages, 'grayscale', () => toGrayscale(image));
    if (!gray) {
      return { image: this.expand(stages, image), skewAngle: 0, deskewed: false, stages };
    }

    const denoised =
      this.runStage(stages, 'denoise', () => nonLocalMeansDenoise(gray, this.config.denoise)) ?? gray;

    const contrasted =
      this.runStage(stages, 'contrast', () => this.applyContrast(denoised, highContrastMode)) ?? denoised;

    let skewAngle = 0;
    let deskewed = false;
    const straightened =
      this.runStage(stages, 'deskew', () => {
        const result = deskew(contrasted, this.config.deskew);
        skewAngle = result.angle ?? 0;
        deskewed = result.rotated;
        if (!result.rotated) {
          const angle = result.angle === null ? 'none' : result.angle.toFixed(2);
          stages.push({ stage: 'deskew', status: 'skipped', detail: `${result.reason} (angle ${angle})` });
        }
        return result.image;
      }) ?? contrasted;

    const rgb = this.runStage(stages, 'expand', () => grayToRgb(straightened));
    return {
      image: rgb ?? createBlankImage(image.width, image.height),
      skewAngle,
      deskewed,
      stages,
    };
  }

  private applyContrast(image: GrayImage, highContrastMode: boolean): GrayImage {
    if (highContrastMode) {
      const { image: binary, threshold } = binarizeOtsu(image);
      log.debug({ threshold }, 'Applied Otsu binarization');
      return binary;
    }
    return applyClahe(image, this.config.clahe);
  }

  /**
   * Last-resort path when grayscale conversion failed: try to bring the
   * original to three channels, else return a blank page of the same size.
   */
  private expand(stages: StageReport[], image: DocumentImage): DocumentImage {
    return this.runStage(stages, 'expand', () => toRgb(image)) ?? createBlankImage(image.width, image.height);
  }

  private runStage<T>(stages: StageReport[], stage: NormalizationStage, fn: () => T): T | null {
    try {
      const result = fn();
      if (!stages.some((report) => report.stage === stage)) {
        stages.push({ stage, status: 'applied' });
      }
      return result;
    } catch (error) {
      log.warn({ error: getErrorMessage(error), stage }, 'Normalization stage failed, passing input through');
      stages.push({ stage, status: 'failed', detail: getErrorMessage(error) });
      return null;
    }
  }
}
