/**
 * ObjectDetector Interface
 *
 * Implementations: CommandObjectDetector
 *
 * Worker-side capability wrapping the model. The worker app holds one
 * long-lived instance and never touches model state directly.
 */
export interface ObjectDetector {
  /** Detector identifier for logging/health output */
  readonly detectorId: string;

  /**
   * Count objects in an image
   * @param image - Encoded image bytes
   * @param filename - Display name, used for logging and temp file suffix
   */
  countObjects(image: Buffer, filename: string): Promise<number>;
}
