/**
 * Handles for input files
 */

/** An image file on disk that can be handed to a text recognizer */
export interface ImageSource {
  /** Identifier recorded on every record extracted from the image (file name) */
  id: string;
  /** Absolute or working-directory-relative path */
  path: string;
}
