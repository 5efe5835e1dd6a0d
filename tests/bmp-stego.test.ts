/**
 * BMP Steganography Tests
 *
 * Full encode/decode runs against real files in a temporary directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import {
  ContainerReader,
  FileScope,
  StegoError,
  embedInBMP,
  extractFromBMP,
  getImageInfo,
  hasEmbeddedData,
  packBytes,
  packUint32,
} from '../src/steganography/index.js';
import {
  createBmp,
  createRecordingReporter,
  createTestDir,
  exists,
  patternPixels,
  removeTestDir,
  trackOpenedFiles,
  writeBmp,
  writeSecret,
} from './setup.js';

describe('BMP Steganography', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTestDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTestDir(dir);
  });

  describe('embedInBMP', () => {
    it('should hide a small text file and leave everything else untouched', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const outputPath = path.join(dir, 'stego.bmp');

      const result = await embedInBMP({ coverPath, secretPath, outputPath });

      expect(result).toEqual({
        success: true,
        outputPath,
        extension: '.txt',
        payloadBytes: 2,
        carrierBytesUsed: 128,
        geometry: { width: 32, height: 32, capacityBytes: 3072 },
      });

      const cover = await fs.readFile(coverPath);
      const stego = await fs.readFile(outputPath);
      expect(stego.length).toBe(cover.length);
      expect(stego.subarray(0, 54).equals(cover.subarray(0, 54))).toBe(true);
      expect(stego.subarray(54 + 128).equals(cover.subarray(54 + 128))).toBe(true);
      expect(Array.from(stego.subarray(54, 70), (byte) => byte & 1)).toEqual([
        1, 1, 0, 0, 0, 1, 0, 0,
        0, 1, 0, 1, 0, 1, 0, 0,
      ]);
    });

    it('should accept a secret that exactly fills the image', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'fill.bin', Buffer.alloc(370, 0xab));

      const result = await embedInBMP({ coverPath, secretPath, outputPath: path.join(dir, 'out.bmp') });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.carrierBytesUsed).toBe(3072);
      }
    });

    it('should fail with InsufficientCapacity before creating the output', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'big.bin', Buffer.alloc(371, 0xab));
      const outputPath = path.join(dir, 'out.bmp');

      const result = await embedInBMP({ coverPath, secretPath, outputPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('InsufficientCapacity');
        expect(result.error.stage).toBe('capacity');
      }
      expect(await exists(outputPath)).toBe(false);
    });

    it('should remove the partial output when the cover runs out of pixels', async () => {
      const fullCover = await writeBmp(dir, 'full.bmp', 32, 32);
      const coverPath = path.join(dir, 'cut.bmp');
      await fs.writeFile(coverPath, (await fs.readFile(fullCover)).subarray(0, 54 + 120));
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const outputPath = path.join(dir, 'out.bmp');

      const result = await embedInBMP({ coverPath, secretPath, outputPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('EncodeError');
        expect(result.error.stage).toBe('payload');
      }
      expect(await exists(outputPath)).toBe(false);
    });

    it('should reject an empty secret', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'empty.txt', '');
      const outputPath = path.join(dir, 'out.bmp');

      const result = await embedInBMP({ coverPath, secretPath, outputPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ArgumentError');
      }
      expect(await exists(outputPath)).toBe(false);
    });

    it('should fail with FileOpenError when the cover is missing', async () => {
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const outputPath = path.join(dir, 'out.bmp');

      const result = await embedInBMP({
        coverPath: path.join(dir, 'missing.bmp'),
        secretPath,
        outputPath,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('FileOpenError');
        expect(result.error.stage).toBe('open');
      }
      expect(await exists(outputPath)).toBe(false);
    });

    it('should reject a secret without an extension', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'README', 'read me');

      const result = await embedInBMP({ coverPath, secretPath, outputPath: path.join(dir, 'out.bmp') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ArgumentError');
      }
    });

    it('should refuse to write over the cover image', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const before = await fs.readFile(coverPath);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');

      const result = await embedInBMP({ coverPath, secretPath, outputPath: coverPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ArgumentError');
      }
      expect((await fs.readFile(coverPath)).equals(before)).toBe(true);
    });

    it('should report every stage in order', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const recording = createRecordingReporter();

      await embedInBMP({
        coverPath,
        secretPath,
        outputPath: path.join(dir, 'out.bmp'),
        reporter: recording.reporter,
      });

      const stages = ['open', 'capacity', 'header', 'signature', 'extension', 'size', 'payload', 'remainder'];
      expect(recording.started).toEqual(stages);
      expect(recording.completed).toEqual(stages);
      expect(recording.progress).toEqual([[2, 2]]);
      expect(recording.warnings).toEqual([]);
    });
  });

  describe('extractFromBMP', () => {
    async function embedText(content: string | Buffer, name = 'note.txt', width = 32, height = 32) {
      const coverPath = await writeBmp(dir, 'cover.bmp', width, height);
      const secretPath = await writeSecret(dir, name, content);
      const stegoPath = path.join(dir, 'stego.bmp');
      const result = await embedInBMP({ coverPath, secretPath, outputPath: stegoPath });
      expect(result.success).toBe(true);
      return { coverPath, stegoPath };
    }

    it('should recover the secret under the default name', async () => {
      const { stegoPath } = await embedText('hi');

      const result = await extractFromBMP({ stegoPath, defaultStem: path.join(dir, 'decoded') });

      const expected = path.join(dir, 'decoded.txt');
      expect(result).toEqual({ success: true, outputPath: expected, extension: '.txt', payloadBytes: 2 });
      expect(await fs.readFile(expected, 'utf-8')).toBe('hi');
    });

    it('should replace the extension of a user-chosen name', async () => {
      const { stegoPath } = await embedText('hi');

      const result = await extractFromBMP({ stegoPath, outputName: path.join(dir, 'restored.dat') });

      expect(result.success).toBe(true);
      expect(await fs.readFile(path.join(dir, 'restored.txt'), 'utf-8')).toBe('hi');
    });

    it('should round-trip a binary file across several batches', async () => {
      const secret = Buffer.alloc(1500);
      for (let i = 0; i < secret.length; i++) {
        secret[i] = (i * 131 + 17) & 0xff;
      }
      const { stegoPath } = await embedText(secret, 'blob.bin', 64, 64);
      const recording = createRecordingReporter();

      const result = await extractFromBMP({
        stegoPath,
        outputName: path.join(dir, 'blob'),
        reporter: recording.reporter,
      });

      expect(result.success).toBe(true);
      expect((await fs.readFile(path.join(dir, 'blob.bin'))).equals(secret)).toBe(true);
      expect(recording.progress).toEqual([[512, 1500], [1024, 1500], [1500, 1500]]);
      expect(recording.started).toEqual(['open', 'header', 'signature', 'extension', 'size', 'payload']);
    });

    it('should report a clean image as NotSteganographicImage without writing', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);

      const result = await extractFromBMP({ stegoPath: coverPath, defaultStem: path.join(dir, 'decoded') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('NotSteganographicImage');
        expect(result.outputPath).toBeUndefined();
      }
      expect(await fs.readdir(dir)).toEqual(['cover.bmp']);
    });

    it('should detect a truncated image before creating the output', async () => {
      const { stegoPath } = await embedText('hi');
      const cutPath = path.join(dir, 'cut.bmp');
      await fs.writeFile(cutPath, (await fs.readFile(stegoPath)).subarray(0, 54 + 120));

      const result = await extractFromBMP({ stegoPath: cutPath, defaultStem: path.join(dir, 'decoded') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('TruncatedStegoImage');
        expect(result.error.stage).toBe('size');
      }
      expect(await exists(path.join(dir, 'decoded.txt'))).toBe(false);
    });

    it('should refuse an extension that would leave the output directory', async () => {
      const pixels = patternPixels(32 * 32 * 3);
      packBytes(Buffer.from('#*'), pixels, 0);
      packUint32(2, pixels, 16);
      packBytes(Buffer.from('/x'), pixels, 48);
      packUint32(2, pixels, 64);
      packBytes(Buffer.from('hi'), pixels, 96);
      const stegoPath = path.join(dir, 'crafted.bmp');
      await fs.writeFile(stegoPath, createBmp(32, 32, pixels));
      await fs.mkdir(path.join(dir, 'decoded'));

      const result = await extractFromBMP({ stegoPath, defaultStem: path.join(dir, 'decoded') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('CorruptContainer');
        expect(result.error.stage).toBe('extension');
      }
      expect(await fs.readdir(path.join(dir, 'decoded'))).toEqual([]);
    });

    it('should fail with TruncatedRead on a file shorter than a BMP header', async () => {
      const tinyPath = path.join(dir, 'tiny.bmp');
      await fs.writeFile(tinyPath, Buffer.alloc(20));

      const result = await extractFromBMP({ stegoPath: tinyPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('TruncatedRead');
        expect(result.error.stage).toBe('header');
      }
    });

    it('should refuse an output name that resolves to the stego image', async () => {
      const { stegoPath } = await embedText('BM', 'picture.bmp');
      const before = await fs.readFile(stegoPath);

      const result = await extractFromBMP({ stegoPath, outputName: path.join(dir, 'stego') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('ArgumentError');
      }
      expect((await fs.readFile(stegoPath)).equals(before)).toBe(true);
    });
  });

  describe('image inspection', () => {
    it('should describe dimensions and capacity', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);

      expect(await getImageInfo(coverPath)).toEqual({
        width: 32,
        height: 32,
        capacityBytes: 3072,
        fileSize: 3126,
        maxSecretBytes: 370,
      });
    });

    it('should tell stego images from clean ones', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const stegoPath = path.join(dir, 'stego.bmp');
      await embedInBMP({ coverPath, secretPath, outputPath: stegoPath });

      expect(await hasEmbeddedData(coverPath)).toBe(false);
      expect(await hasEmbeddedData(stegoPath)).toBe(true);
    });

    it('should treat a header-only file as having no hidden data', async () => {
      const headerOnly = path.join(dir, 'header.bmp');
      await fs.writeFile(headerOnly, Buffer.alloc(54));

      expect(await hasEmbeddedData(headerOnly)).toBe(false);
    });
  });

  describe('file handles', () => {
    it('should release the cover and secret after an InsufficientCapacity failure', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'big.bin', Buffer.alloc(371, 0xab));
      const tracked = trackOpenedFiles();

      const result = await embedInBMP({ coverPath, secretPath, outputPath: path.join(dir, 'out.bmp') });

      expect(result.success).toBe(false);
      expect(tracked.handles).toHaveLength(2);
      expect(tracked.allClosed()).toBe(true);
    });

    it('should release all three files after an EncodeError', async () => {
      const fullCover = await writeBmp(dir, 'full.bmp', 32, 32);
      const coverPath = path.join(dir, 'cut.bmp');
      await fs.writeFile(coverPath, (await fs.readFile(fullCover)).subarray(0, 54 + 120));
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const tracked = trackOpenedFiles();

      const result = await embedInBMP({ coverPath, secretPath, outputPath: path.join(dir, 'out.bmp') });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('EncodeError');
      }
      expect(tracked.handles).toHaveLength(3);
      expect(tracked.allClosed()).toBe(true);
    });

    it('should release all files after a successful round trip', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const stegoPath = path.join(dir, 'stego.bmp');
      const tracked = trackOpenedFiles();

      await embedInBMP({ coverPath, secretPath, outputPath: stegoPath });
      await extractFromBMP({ stegoPath, defaultStem: path.join(dir, 'decoded') });

      expect(tracked.handles).toHaveLength(5);
      expect(tracked.allClosed()).toBe(true);
    });

    it('should fail and remove the stego image when the final close fails', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const outputPath = path.join(dir, 'out.bmp');
      const tracked = trackOpenedFiles();
      const closeAll = FileScope.prototype.closeAll;
      vi.spyOn(FileScope.prototype, 'closeAll').mockImplementationOnce(async function (this: FileScope) {
        await closeAll.call(this);
        return [new StegoError('IOError', 'Failed to close file: flush failed')];
      });

      const result = await embedInBMP({ coverPath, secretPath, outputPath });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('IOError');
        expect(result.error.stage).toBe('remainder');
      }
      expect(await exists(outputPath)).toBe(false);
      expect(tracked.allClosed()).toBe(true);
    });

    it('should release the image after a NotSteganographicImage failure', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const tracked = trackOpenedFiles();

      const result = await extractFromBMP({ stegoPath: coverPath, defaultStem: path.join(dir, 'decoded') });

      expect(result.success).toBe(false);
      expect(tracked.handles).toHaveLength(1);
      expect(tracked.allClosed()).toBe(true);
    });

    it('should release both files and remove the output after a payload failure', async () => {
      const coverPath = await writeBmp(dir, 'cover.bmp', 32, 32);
      const secretPath = await writeSecret(dir, 'note.txt', 'hi');
      const stegoPath = path.join(dir, 'stego.bmp');
      await embedInBMP({ coverPath, secretPath, outputPath: stegoPath });
      const tracked = trackOpenedFiles();
      vi.spyOn(ContainerReader.prototype, 'readPayload').mockImplementationOnce(async (sink) => {
        await sink.write(Buffer.from('partial'));
        throw new StegoError('IOError', 'Disk full');
      });

      const result = await extractFromBMP({ stegoPath, defaultStem: path.join(dir, 'decoded') });

      const outputPath = path.join(dir, 'decoded.txt');
      expect(result).toEqual({ success: false, outputPath, error: expect.any(StegoError) });
      if (!result.success) {
        expect(result.error.kind).toBe('IOError');
        expect(result.error.stage).toBe('payload');
      }
      expect(tracked.handles).toHaveLength(2);
      expect(tracked.allClosed()).toBe(true);
      expect(await exists(outputPath)).toBe(false);
    });
  });
});
