import fs from 'fs/promises';
import path from 'path';
import { CARRIER_BYTES_PER_BYTE } from './bit-codec.js';
import {
  BMP_HEADER_SIZE,
  calculateCapacity,
  checkCapacity,
  readBmpGeometry,
  type BmpGeometry,
} from './capacity.js';
import { FileByteSink, FileByteSource, FileScope } from './carrier-stream.js';
import { ContainerReader, ContainerWriter } from './container.js';
import { StegoError, toStegoError, type StegoStage } from './errors.js';
import { DEFAULT_DECODED_STEM, DEFAULT_STEGO_NAME, resolveOutputFilename, secretExtension } from './naming.js';
import { silentReporter, type StegoReporter } from './reporter.js';

export interface EmbedOptions {
  coverPath: string;
  secretPath: string;
  /** Defaults to stego.bmp in the working directory */
  outputPath?: string;
  reporter?: StegoReporter;
}

export type EmbedResult =
  | {
      success: true;
      outputPath: string;
      extension: string;
      payloadBytes: number;
      carrierBytesUsed: number;
      geometry: BmpGeometry;
    }
  | { success: false; outputPath: string; error: StegoError };

export interface ExtractOptions {
  stegoPath: string;
  /** User-chosen name; anything from its first dot is replaced by the decoded extension */
  outputName?: string;
  defaultStem?: string;
  reporter?: StegoReporter;
}

export type ExtractResult =
  | { success: true; outputPath: string; extension: string; payloadBytes: number }
  | { success: false; outputPath?: string; error: StegoError };

export interface ImageInfo extends BmpGeometry {
  fileSize: number;
  /** Largest secret the capacity check admits */
  maxSecretBytes: number;
}

function samePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}

/**
 * Release everything a failed run still holds: open handles first, then the
 * partial output file. Problems here are reported as warnings so they never
 * mask the failure that got us here.
 */
async function releaseAfterFailure(
  files: FileScope,
  partialOutput: string | undefined,
  reporter: StegoReporter
): Promise<void> {
  for (const closeError of await files.closeAll()) {
    reporter.warn?.(closeError.message);
  }

  if (partialOutput) {
    try {
      await fs.rm(partialOutput, { force: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      reporter.warn?.(`Could not remove incomplete output ${partialOutput}: ${reason}`);
    }
  }
}

async function closeOrThrow(files: FileScope): Promise<void> {
  const failures = await files.closeAll();
  if (failures.length > 0) {
    throw failures[0];
  }
}

/**
 * Hide a secret file inside a 24-bit BMP cover image.
 *
 * The capacity check runs before the destination exists. Any failure after
 * that removes the destination, so a stego image on disk is always complete.
 */
export async function embedInBMP(options: EmbedOptions): Promise<EmbedResult> {
  const outputPath = options.outputPath ?? DEFAULT_STEGO_NAME;
  const reporter = options.reporter ?? silentReporter;
  const files = new FileScope();
  let stage: StegoStage = 'open';
  let outputCreated = false;

  const enter = (next: StegoStage): void => {
    stage = next;
    reporter.stageStarted?.(next);
  };

  try {
    enter('open');
    if (samePath(outputPath, options.coverPath) || samePath(outputPath, options.secretPath)) {
      throw new StegoError('ArgumentError', `Output ${outputPath} would overwrite an input file`);
    }
    const coverHandle = await files.open(options.coverPath, 'r');
    const secretHandle = await files.open(options.secretPath, 'r');
    const secretSize = (await secretHandle.stat()).size;
    if (secretSize === 0) {
      throw new StegoError('ArgumentError', `Secret file ${options.secretPath} is empty`);
    }
    reporter.stageCompleted?.('open');

    enter('capacity');
    const extension = secretExtension(options.secretPath);
    const cover = new FileByteSource(coverHandle);
    const { header, geometry } = await readBmpGeometry(cover);
    if (!checkCapacity(geometry.capacityBytes, secretSize)) {
      throw new StegoError(
        'InsufficientCapacity',
        `Image ${geometry.width}x${geometry.height} holds at most ${calculateCapacity(geometry.capacityBytes)} bytes, secret is ${secretSize} bytes`
      );
    }
    reporter.stageCompleted?.(
      'capacity',
      `${geometry.width}x${geometry.height}, ${secretSize} of ${calculateCapacity(geometry.capacityBytes)} bytes`
    );

    enter('header');
    const stegoHandle = await files.open(outputPath, 'w');
    outputCreated = true;
    const stego = new FileByteSink(stegoHandle);
    await stego.write(header);
    reporter.stageCompleted?.('header');

    const writer = new ContainerWriter(cover, stego);

    enter('signature');
    await writer.writeSignature();
    reporter.stageCompleted?.('signature');

    enter('extension');
    await writer.writeExtension(extension);
    reporter.stageCompleted?.('extension', extension);

    enter('size');
    await writer.writePayloadLength(secretSize);
    reporter.stageCompleted?.('size', `${secretSize} bytes`);

    enter('payload');
    await writer.writePayload(new FileByteSource(secretHandle), secretSize, (done, total) =>
      reporter.progress?.(done, total)
    );
    reporter.stageCompleted?.('payload');

    enter('remainder');
    await writer.copyRemainder();
    await closeOrThrow(files);
    reporter.stageCompleted?.('remainder');

    return {
      success: true,
      outputPath,
      extension,
      payloadBytes: secretSize,
      carrierBytesUsed: writer.carrierBytesUsed,
      geometry,
    };
  } catch (error) {
    const failure = toStegoError(error, stage);
    await releaseAfterFailure(files, outputCreated ? outputPath : undefined, reporter);
    return { success: false, outputPath, error: failure };
  }
}

/**
 * Recover the secret file hidden in a stego image.
 *
 * Nothing is written until the signature and extension have been read, so
 * an image without hidden data never produces an output file.
 */
export async function extractFromBMP(options: ExtractOptions): Promise<ExtractResult> {
  const reporter = options.reporter ?? silentReporter;
  const files = new FileScope();
  let stage: StegoStage = 'open';
  let outputPath: string | undefined;
  let outputCreated = false;

  const enter = (next: StegoStage): void => {
    stage = next;
    reporter.stageStarted?.(next);
  };

  try {
    enter('open');
    const stegoHandle = await files.open(options.stegoPath, 'r');
    const fileSize = (await stegoHandle.stat()).size;
    reporter.stageCompleted?.('open');

    enter('header');
    if (fileSize < BMP_HEADER_SIZE) {
      throw new StegoError('TruncatedRead', `${options.stegoPath} is too small to be a BMP image`);
    }
    const source = new FileByteSource(stegoHandle, BMP_HEADER_SIZE);
    const reader = new ContainerReader(source);
    reporter.stageCompleted?.('header');

    enter('signature');
    await reader.readSignature();
    reporter.stageCompleted?.('signature');

    enter('extension');
    const extension = await reader.readExtension();
    reporter.stageCompleted?.('extension', extension);

    enter('size');
    const payloadBytes = await reader.readPayloadLength();
    const remaining = fileSize - source.offset;
    if (payloadBytes * CARRIER_BYTES_PER_BYTE > remaining) {
      throw new StegoError(
        'TruncatedStegoImage',
        `Hidden file claims ${payloadBytes} bytes, image only has room for ${Math.floor(remaining / CARRIER_BYTES_PER_BYTE)}`
      );
    }
    reporter.stageCompleted?.('size', `${payloadBytes} bytes`);

    enter('payload');
    outputPath = resolveOutputFilename(options.outputName, extension, options.defaultStem ?? DEFAULT_DECODED_STEM);
    if (samePath(outputPath, options.stegoPath)) {
      throw new StegoError('ArgumentError', `Output ${outputPath} would overwrite the stego image`);
    }
    const outputHandle = await files.open(outputPath, 'w');
    outputCreated = true;
    await reader.readPayload(new FileByteSink(outputHandle), payloadBytes, (done, total) =>
      reporter.progress?.(done, total)
    );
    await closeOrThrow(files);
    reporter.stageCompleted?.('payload', outputPath);

    return { success: true, outputPath, extension, payloadBytes };
  } catch (error) {
    const failure = toStegoError(error, stage);
    await releaseAfterFailure(files, outputCreated ? outputPath : undefined, reporter);
    return { success: false, outputPath, error: failure };
  }
}

/**
 * Dimensions and capacity of a BMP image
 */
export async function getImageInfo(imagePath: string): Promise<ImageInfo> {
  const files = new FileScope();
  try {
    const handle = await files.open(imagePath, 'r');
    const fileSize = (await handle.stat()).size;
    const { geometry } = await readBmpGeometry(new FileByteSource(handle));
    return {
      ...geometry,
      fileSize,
      maxSecretBytes: calculateCapacity(geometry.capacityBytes),
    };
  } finally {
    await closeOrThrow(files);
  }
}

/**
 * Whether an image starts with the container signature
 */
export async function hasEmbeddedData(imagePath: string): Promise<boolean> {
  const files = new FileScope();
  try {
    const handle = await files.open(imagePath, 'r');
    const reader = new ContainerReader(new FileByteSource(handle, BMP_HEADER_SIZE));
    await reader.readSignature();
    return true;
  } catch (error) {
    const empty = error instanceof StegoError &&
      (error.kind === 'NotSteganographicImage' || error.kind === 'TruncatedStegoImage');
    if (empty) {
      return false;
    }
    throw error;
  } finally {
    await closeOrThrow(files);
  }
}

