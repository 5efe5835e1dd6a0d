import path from 'path';
import chalk from 'chalk';
import type { Config } from '../../config.js';
import { embedInBMP, StegoError } from '../../steganography/index.js';
import { formatBytes } from '../progress.js';
import { confirmOverwrite } from '../prompts.js';
import { createConsoleReporter, createQuietReporter, reportFailure } from '../reporter.js';

export interface EncodeCommandOptions {
  force?: boolean;
  quiet?: boolean;
}

export function isBmpPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.bmp';
}

/**
 * Hide a secret file in a BMP cover image. Resolves false on any failure.
 */
export async function encodeCommand(
  coverPath: string,
  secretPath: string,
  outputArg: string | undefined,
  options: EncodeCommandOptions,
  config: Config
): Promise<boolean> {
  const outputPath = outputArg ?? config.defaultStegoName;

  if (!isBmpPath(coverPath)) {
    reportFailure(new StegoError('ArgumentError', `Cover image ${coverPath} should be a .bmp file`));
    return false;
  }
  if (!isBmpPath(outputPath)) {
    reportFailure(new StegoError('ArgumentError', `Output image ${outputPath} should be a .bmp file`));
    return false;
  }

  if (!await confirmOverwrite(outputPath, { force: options.force, confirm: config.confirmOverwrite })) {
    console.log(chalk.gray('\n  Cancelled.\n'));
    return false;
  }

  if (!options.quiet) {
    console.log(chalk.bold('\n  Hide File in Image\n'));
  }

  const reporter = options.quiet ? createQuietReporter() : createConsoleReporter('encode');
  const result = await embedInBMP({ coverPath, secretPath, outputPath, reporter });

  if (!result.success) {
    reporter.fail();
    reportFailure(result.error);
    return false;
  }

  if (!options.quiet) {
    console.log('');
    console.log(chalk.green('  ✓ Encoding done'));
    console.log(chalk.gray(`  Stego image: ${result.outputPath}`));
    console.log(chalk.gray(`  Hidden: ${formatBytes(result.payloadBytes)} (${result.extension})`));
    console.log(chalk.gray(`  Carrier bytes used: ${result.carrierBytesUsed} of ${result.geometry.capacityBytes}`));
    console.log('');
  }
  return true;
}
