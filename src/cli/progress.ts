import cliProgress from 'cli-progress';
import chalk from 'chalk';

/**
 * Format bytes to human readable string (KB, MB, GB)
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function formatSpeed(bytesPerSecond: number): string {
  if (bytesPerSecond < 1024) return `${bytesPerSecond.toFixed(0)} B/s`;
  if (bytesPerSecond < 1024 * 1024) return `${(bytesPerSecond / 1024).toFixed(1)} KB/s`;
  return `${(bytesPerSecond / (1024 * 1024)).toFixed(1)} MB/s`;
}

export function formatETA(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.ceil(seconds)}s`;
  const mins = Math.floor(seconds / 60);
  const secs = Math.ceil(seconds % 60);
  return `${mins}m ${secs}s`;
}

export type ProgressAction = 'Embedding' | 'Extracting';

export interface ProgressTracker {
  setProgress: (processed: number, total: number) => void;
  finish: () => void;
  stop: () => void;
}

/**
 * Byte progress bar with speed and ETA for the payload stage
 */
export function createProgressTracker(action: ProgressAction, totalBytes: number): ProgressTracker {
  const bar = new cliProgress.SingleBar({
    format: `  ${action} |${chalk.cyan('{bar}')}| {percentage}% | {processed}/{size} | {speed} | ETA: {eta}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    clearOnComplete: false,
    stopOnComplete: false,
  }, cliProgress.Presets.shades_classic);

  const startTime = Date.now();
  let currentTotal = totalBytes;
  let stopped = false;

  bar.start(100, 0, {
    processed: formatBytes(0),
    size: formatBytes(totalBytes),
    speed: '-- KB/s',
    eta: '--:--',
  });

  const render = (processed: number) => {
    const elapsed = (Date.now() - startTime) / 1000;
    const speed = elapsed > 0 ? processed / elapsed : 0;
    const eta = speed > 0 ? (currentTotal - processed) / speed : Infinity;
    const percentage = currentTotal > 0 ? Math.round((processed / currentTotal) * 100) : 100;

    bar.update(percentage, {
      processed: formatBytes(processed),
      size: formatBytes(currentTotal),
      speed: formatSpeed(speed),
      eta: formatETA(eta),
    });
  };

  return {
    setProgress(processed: number, total: number) {
      if (total > 0) {
        currentTotal = total;
      }
      render(Math.min(processed, currentTotal));
    },

    finish() {
      if (stopped) return;
      render(currentTotal);
      bar.stop();
      stopped = true;
    },

    stop() {
      if (stopped) return;
      bar.stop();
      stopped = true;
    },
  };
}
