/**
 * @intake/connector-ocr
 *
 * Text recognition adapters implementing the TextRecognizer interface
 */

export { TesseractCliRecognizer, createTesseractRecognizer } from './tesseract-recognizer.js';
export type { TesseractCliOptions, ExecFileFn, ExecFileOptions } from './tesseract-recognizer.js';

export type { TextRecognizer, ImageSource } from '@intake/core';
