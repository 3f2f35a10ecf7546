/**
 * Vision Template Types
 */

/**
 * Prompt sent alongside one rendered page image
 */
export interface VisionTemplate {
  /** Instruction text accompanying the image */
  userPrompt: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
