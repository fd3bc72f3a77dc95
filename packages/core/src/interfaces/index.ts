export type { TextRecognizer } from './text-recognizer.js';
