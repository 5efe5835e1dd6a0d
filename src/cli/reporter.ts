import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  describeStage,
  silentReporter,
  type StegoError,
  type StegoReporter,
  type StegoStage,
} from '../steganography/index.js';
import { createProgressTracker, type ProgressTracker } from './progress.js';

export type ReporterMode = 'encode' | 'decode';

export interface ConsoleReporter extends StegoReporter {
  /** Stop whatever spinner or bar is running, marking it failed */
  fail(): void;
}

const ENCODE_LABELS: Record<StegoStage, string> = {
  open: 'Opening cover image and secret file',
  capacity: 'Checking image capacity',
  header: 'Copying image header',
  signature: 'Encoding signature',
  extension: 'Encoding file extension',
  size: 'Encoding file size',
  payload: 'Encoding file data',
  remainder: 'Copying remaining image data',
};

const DECODE_LABELS: Record<StegoStage, string> = {
  open: 'Opening stego image',
  capacity: 'Checking image capacity',
  header: 'Skipping image header',
  signature: 'Decoding signature',
  extension: 'Decoding file extension',
  size: 'Decoding file size',
  payload: 'Decoding file data',
  remainder: 'Finishing',
};

/**
 * Spinner per stage, byte progress bar while the payload moves
 */
export function createConsoleReporter(mode: ReporterMode): ConsoleReporter {
  const labels = mode === 'encode' ? ENCODE_LABELS : DECODE_LABELS;
  let spinner: Ora | undefined;
  let tracker: ProgressTracker | undefined;

  return {
    stageStarted(stage) {
      if (stage === 'payload') {
        // cli-progress owns the line while data moves
        console.log(chalk.gray(`  ${labels.payload}...`));
        return;
      }
      spinner = ora(labels[stage]).start();
    },

    stageCompleted(stage, detail) {
      const text = detail ? `${labels[stage]} (${detail})` : labels[stage];
      if (stage === 'payload') {
        tracker?.finish();
        tracker = undefined;
        ora().succeed(text);
        return;
      }
      spinner?.succeed(text);
      spinner = undefined;
    },

    progress(processedBytes, totalBytes) {
      tracker ??= createProgressTracker(mode === 'encode' ? 'Embedding' : 'Extracting', totalBytes);
      tracker.setProgress(processedBytes, totalBytes);
    },

    warn(message) {
      console.log(chalk.yellow(`  ⚠ ${message}`));
    },

    fail() {
      tracker?.stop();
      tracker = undefined;
      spinner?.fail();
      spinner = undefined;
    },
  };
}

export function createQuietReporter(): ConsoleReporter {
  return { ...silentReporter, fail() {} };
}

/**
 * Print a pipeline failure with its kind and the stage it happened in
 */
export function reportFailure(error: StegoError): void {
  const where = error.stage ? ` during ${describeStage(error.stage)}` : '';
  console.log('');
  console.log(chalk.red(`  ✗ ${error.kind}${where}`));
  console.log(chalk.red(`  ${error.message}`));
  console.log('');
}
