import chalk from 'chalk';
import { getImageInfo, hasEmbeddedData, toStegoError } from '../../steganography/index.js';
import { formatBytes } from '../progress.js';
import { reportFailure } from '../reporter.js';

/**
 * Show dimensions, capacity and whether the image already carries data
 */
export async function infoCommand(imagePath: string): Promise<boolean> {
  try {
    const info = await getImageInfo(imagePath);
    const embedded = await hasEmbeddedData(imagePath);

    console.log(chalk.bold(`\n  ${imagePath}\n`));
    console.log(chalk.gray(`  Dimensions: ${info.width} x ${info.height}`));
    console.log(chalk.gray(`  File size: ${formatBytes(info.fileSize)}`));
    console.log(chalk.gray(`  Pixel bytes: ${info.capacityBytes}`));
    console.log(chalk.gray(`  Max secret size: ${formatBytes(info.maxSecretBytes)}`));
    console.log(
      embedded
        ? chalk.green('  Hidden data: yes')
        : chalk.gray('  Hidden data: none found')
    );
    console.log('');
    return true;
  } catch (error) {
    reportFailure(toStegoError(error));
    return false;
  }
}
