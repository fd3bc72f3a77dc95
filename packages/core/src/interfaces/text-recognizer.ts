/**
 * Text Recognizer Interface
 *
 * The optical text-recognition engine is consumed as a black box that turns
 * one image into line-oriented text. Implementations live outside the core.
 */

import type { ImageSource } from '../types/index.js';

export interface TextRecognizer {
  /** Short name used in logs (e.g. "tesseract") */
  readonly name: string;

  /**
   * Recognize the text of one image.
   * Resolves to an empty string when nothing was recognized, never null.
   * @throws ReceivingError with code RECOGNITION_FAILED if the engine fails
   */
  recognize(image: ImageSource): Promise<string>;
}
