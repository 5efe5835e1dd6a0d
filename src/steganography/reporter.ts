import type { StegoStage } from './errors.js';

/**
 * Hooks the pipelines call as they move through their stages. The core never
 * prints; the CLI turns these into spinners and a progress bar.
 */
export interface StegoReporter {
  stageStarted?(stage: StegoStage): void;
  stageCompleted?(stage: StegoStage, detail?: string): void;
  progress?(processedBytes: number, totalBytes: number): void;
  warn?(message: string): void;
}

export const silentReporter: StegoReporter = {};
