import chalk from 'chalk';
import type { Config } from '../../config.js';
import { extractFromBMP, StegoError } from '../../steganography/index.js';
import { formatBytes } from '../progress.js';
import { createConsoleReporter, createQuietReporter, reportFailure } from '../reporter.js';
import { isBmpPath } from './encode.js';

export interface DecodeCommandOptions {
  quiet?: boolean;
}

/**
 * Recover a hidden file. The output name's extension always comes from the
 * image, so overwrite confirmation is not possible up front.
 */
export async function decodeCommand(
  stegoPath: string,
  outputName: string | undefined,
  options: DecodeCommandOptions,
  config: Config
): Promise<boolean> {
  if (!isBmpPath(stegoPath)) {
    reportFailure(new StegoError('ArgumentError', `Stego image ${stegoPath} should be a .bmp file`));
    return false;
  }

  if (!options.quiet) {
    console.log(chalk.bold('\n  Extract Hidden File\n'));
  }

  const reporter = options.quiet ? createQuietReporter() : createConsoleReporter('decode');
  const result = await extractFromBMP({
    stegoPath,
    outputName,
    defaultStem: config.defaultDecodedStem,
    reporter,
  });

  if (!result.success) {
    reporter.fail();
    reportFailure(result.error);
    return false;
  }

  if (!options.quiet) {
    console.log('');
    console.log(chalk.green('  ✓ Decoding done'));
    console.log(chalk.gray(`  Output: ${result.outputPath}`));
    console.log(chalk.gray(`  Size: ${formatBytes(result.payloadBytes)}`));
    console.log('');
  }
  return true;
}
