import {
  CARRIER_BYTES_PER_BYTE,
  CARRIER_BYTES_PER_UINT32,
  packBytes,
  packUint32,
  unpackBytes,
  unpackUint32,
} from './bit-codec.js';
import type { ByteSink, ByteSource } from './carrier-stream.js';
import { StegoError, type StegoErrorKind, type StegoStage } from './errors.js';

/**
 * Container layout, one bit per carrier byte:
 *
 *   signature   8 × 2        "#*"
 *   extLen      32           uint32
 *   extension   8 × extLen   ASCII, leading dot included
 *   payloadLen  32           uint32
 *   payload     8 × payloadLen
 */
export const SIGNATURE = '#*';
export const SIGNATURE_BYTES = Buffer.from(SIGNATURE, 'ascii');

/** Upper bound for a decoded extLen before it is treated as noise */
export const MAX_EXTENSION_LENGTH = 10;

/** Extensions must be strictly shorter than this */
export const EXTENSION_BUFFER_SIZE = 5;

/** Payload bytes moved per read/write round trip */
export const PAYLOAD_BATCH_BYTES = 512;

export type ContainerProgress = (processedBytes: number, totalBytes: number) => void;

/**
 * Carrier bytes a container with the given field lengths occupies
 */
export function containerCarrierBytes(extensionLength: number, payloadLength: number): number {
  return (
    CARRIER_BYTES_PER_BYTE * (SIGNATURE_BYTES.length + extensionLength) +
    2 * CARRIER_BYTES_PER_UINT32 +
    CARRIER_BYTES_PER_BYTE * payloadLength
  );
}

export function isPrintableAscii(data: Uint8Array): boolean {
  return data.every((byte) => byte >= 0x21 && byte <= 0x7e);
}

const DOT = 0x2e;
const SLASH = 0x2f;
const BACKSLASH = 0x5c;

/**
 * An extension ends up in an output path: it must start with its dot and
 * never contain a path separator
 */
export function isFileExtension(data: Uint8Array): boolean {
  return data.length > 0 && data[0] === DOT && !data.includes(SLASH) && !data.includes(BACKSLASH);
}

async function readExactly(
  source: ByteSource,
  length: number,
  kind: StegoErrorKind,
  stage: StegoStage
): Promise<Buffer> {
  const chunk = await source.read(length);
  if (chunk.length < length) {
    throw new StegoError(kind, `Expected ${length} bytes, got ${chunk.length}`, { stage });
  }
  return chunk;
}

/**
 * Writes the container into clean carrier bytes read from the cover,
 * sending the modified bytes to the stego sink.
 */
export class ContainerWriter {
  private consumed = 0;

  constructor(
    private readonly carrier: ByteSource,
    private readonly sink: ByteSink
  ) {}

  /** Carrier bytes consumed so far */
  get carrierBytesUsed(): number {
    return this.consumed;
  }

  private async nextCarrier(length: number, stage: StegoStage): Promise<Buffer> {
    const chunk = await readExactly(this.carrier, length, 'EncodeError', stage);
    this.consumed += length;
    return chunk;
  }

  private async writeData(data: Uint8Array, stage: StegoStage): Promise<void> {
    const chunk = await this.nextCarrier(data.length * CARRIER_BYTES_PER_BYTE, stage);
    packBytes(data, chunk);
    await this.sink.write(chunk);
  }

  private async writeUint32(value: number, stage: StegoStage): Promise<void> {
    const chunk = await this.nextCarrier(CARRIER_BYTES_PER_UINT32, stage);
    packUint32(value, chunk);
    await this.sink.write(chunk);
  }

  async writeSignature(): Promise<void> {
    await this.writeData(SIGNATURE_BYTES, 'signature');
  }

  async writeExtension(extension: string): Promise<void> {
    const bytes = Buffer.from(extension, 'ascii');
    if (bytes.length >= EXTENSION_BUFFER_SIZE) {
      throw new StegoError(
        'ExtensionTooLong',
        `Extension "${extension}" is ${bytes.length} bytes, limit is ${EXTENSION_BUFFER_SIZE - 1}`,
        { stage: 'extension' }
      );
    }
    if (!isPrintableAscii(bytes) || !isFileExtension(bytes)) {
      throw new StegoError('InvalidInput', `"${extension}" is not a file extension`, { stage: 'extension' });
    }
    await this.writeUint32(bytes.length, 'extension');
    await this.writeData(bytes, 'extension');
  }

  async writePayloadLength(length: number): Promise<void> {
    await this.writeUint32(length, 'size');
  }

  /**
   * Stream `length` bytes from the secret source into the carrier
   */
  async writePayload(secret: ByteSource, length: number, onProgress?: ContainerProgress): Promise<void> {
    let written = 0;
    while (written < length) {
      const want = Math.min(PAYLOAD_BATCH_BYTES, length - written);
      const data = await secret.read(want);
      if (data.length === 0) {
        throw new StegoError('IOError', `Secret file ended after ${written} of ${length} bytes`, {
          stage: 'payload',
        });
      }
      await this.writeData(data, 'payload');
      written += data.length;
      onProgress?.(written, length);
    }
  }

  /**
   * Copy every carrier byte not used by the container, unchanged
   */
  async copyRemainder(): Promise<number> {
    let copied = 0;
    for (;;) {
      const chunk = await this.carrier.read(PAYLOAD_BATCH_BYTES * CARRIER_BYTES_PER_BYTE);
      if (chunk.length === 0) {
        return copied;
      }
      await this.sink.write(chunk);
      copied += chunk.length;
    }
  }
}

/**
 * Mirror of ContainerWriter over stego carrier bytes
 */
export class ContainerReader {
  constructor(private readonly carrier: ByteSource) {}

  private async readData(count: number, stage: StegoStage): Promise<Buffer> {
    const chunk = await readExactly(
      this.carrier,
      count * CARRIER_BYTES_PER_BYTE,
      'TruncatedStegoImage',
      stage
    );
    return unpackBytes(chunk, count);
  }

  private async readUint32(stage: StegoStage): Promise<number> {
    const chunk = await readExactly(this.carrier, CARRIER_BYTES_PER_UINT32, 'TruncatedStegoImage', stage);
    return unpackUint32(chunk);
  }

  async readSignature(): Promise<void> {
    const signature = await this.readData(SIGNATURE_BYTES.length, 'signature');
    if (!signature.equals(SIGNATURE_BYTES)) {
      throw new StegoError('NotSteganographicImage', 'No hidden data found (signature mismatch)', {
        stage: 'signature',
      });
    }
  }

  async readExtension(): Promise<string> {
    const length = await this.readUint32('extension');
    if (length <= 0 || length > MAX_EXTENSION_LENGTH) {
      throw new StegoError('CorruptContainer', `Implausible extension length ${length}`, {
        stage: 'extension',
      });
    }
    if (length >= EXTENSION_BUFFER_SIZE) {
      throw new StegoError(
        'ExtensionTooLong',
        `Extension length ${length} exceeds limit of ${EXTENSION_BUFFER_SIZE - 1}`,
        { stage: 'extension' }
      );
    }

    const bytes = await this.readData(length, 'extension');
    if (!isPrintableAscii(bytes)) {
      throw new StegoError('CorruptContainer', 'Extension contains non-printable bytes', {
        stage: 'extension',
      });
    }
    if (!isFileExtension(bytes)) {
      throw new StegoError('CorruptContainer', `"${bytes.toString('ascii')}" is not a file extension`, {
        stage: 'extension',
      });
    }
    return bytes.toString('ascii');
  }

  async readPayloadLength(): Promise<number> {
    return this.readUint32('size');
  }

  /**
   * Decode `length` payload bytes, handing each batch to the sink as soon
   * as it is decoded
   */
  async readPayload(sink: ByteSink, length: number, onProgress?: ContainerProgress): Promise<void> {
    let decoded = 0;
    while (decoded < length) {
      const count = Math.min(PAYLOAD_BATCH_BYTES, length - decoded);
      const data = await this.readData(count, 'payload');
      await sink.write(data);
      decoded += count;
      onProgress?.(decoded, length);
    }
  }
}
