#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { decodeCommand, encodeCommand, infoCommand } from './cli/commands/index.js';
import type { DecodeCommandOptions, EncodeCommandOptions } from './cli/commands/index.js';
import { loadConfig, loadEnvironment } from './config.js';

// package.json sits one level up from src/, two from dist/src/
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const pkgPath = [path.join(here, '..', 'package.json'), path.join(here, '..', '..', 'package.json')]
    .find((candidate) => existsSync(candidate));
  if (!pkgPath) {
    return '0.0.0';
  }
  const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

async function main(): Promise<void> {
  loadEnvironment();
  const { config, warnings } = await loadConfig();
  for (const warning of warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }

  const VERSION = readVersion();
  const program = new Command();

  program
    .name('lsbmp')
    .description('Hide any file inside a 24-bit BMP image, and get it back')
    .version(VERSION, '-v, --version', 'Show version number')
    .addHelpText('after', `
Examples:
  $ lsbmp encode beach.bmp notes.txt           writes ${config.defaultStegoName}
  $ lsbmp encode beach.bmp notes.txt out.bmp
  $ lsbmp decode out.bmp                       writes ${config.defaultDecodedStem}.txt
  $ lsbmp decode out.bmp recovered             writes recovered.txt
`);

  program
    .command('encode <cover> <secret> [output]')
    .alias('e')
    .description(`Hide <secret> inside <cover> (default output: ${config.defaultStegoName})`)
    .option('-f, --force', 'Overwrite the output image without asking')
    .option('-q, --quiet', 'Only print errors')
    .action(async (cover: string, secret: string, output: string | undefined, options: EncodeCommandOptions) => {
      if (!await encodeCommand(cover, secret, output, options, config)) {
        process.exitCode = 1;
      }
    });

  program
    .command('decode <stego> [output]')
    .alias('d')
    .description(`Extract the hidden file (default name: ${config.defaultDecodedStem}.<ext>)`)
    .option('-q, --quiet', 'Only print errors')
    .action(async (stego: string, output: string | undefined, options: DecodeCommandOptions) => {
      if (!await decodeCommand(stego, output, options, config)) {
        process.exitCode = 1;
      }
    });

  program
    .command('info <image>')
    .description('Show image dimensions, capacity and whether it carries hidden data')
    .action(async (image: string) => {
      if (!await infoCommand(image)) {
        process.exitCode = 1;
      }
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(chalk.red(`\n  ✗ ${error instanceof Error ? error.message : String(error)}\n`));
  process.exitCode = 1;
});
