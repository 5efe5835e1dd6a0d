import { CARRIER_BYTES_PER_BYTE } from './bit-codec.js';
import type { ByteSource } from './carrier-stream.js';
import { StegoError } from './errors.js';

/** Bytes 0-53: file header plus BITMAPINFOHEADER, copied verbatim */
export const BMP_HEADER_SIZE = 54;
export const BMP_WIDTH_OFFSET = 18;
export const BMP_HEIGHT_OFFSET = 22;
export const BYTES_PER_PIXEL = 3;

/**
 * Admission overhead: signature, both length fields and a 4-byte
 * extension. Independent of the real extension length.
 */
export const CAPACITY_OVERHEAD_BYTES = 14;

export interface BmpGeometry {
  width: number;
  height: number;
  /** Pixel bytes available as carriers: width × height × 3 */
  capacityBytes: number;
}

/**
 * Parse width and height out of a 54-byte BMP header
 */
export function parseBmpGeometry(header: Uint8Array): BmpGeometry {
  if (header.length < BMP_HEADER_SIZE) {
    throw new StegoError(
      'TruncatedRead',
      `BMP header needs ${BMP_HEADER_SIZE} bytes, got ${header.length}`,
      { stage: 'header' }
    );
  }

  const view = Buffer.from(header.buffer, header.byteOffset, header.byteLength);
  const width = view.readUInt32LE(BMP_WIDTH_OFFSET);
  const height = view.readUInt32LE(BMP_HEIGHT_OFFSET);

  return {
    width,
    height,
    capacityBytes: width * height * BYTES_PER_PIXEL,
  };
}

/**
 * Read the header from the start of a source and parse its geometry.
 * Returns the raw header too, since encode copies it verbatim.
 */
export async function readBmpGeometry(source: ByteSource): Promise<{ header: Buffer; geometry: BmpGeometry }> {
  const header = await source.read(BMP_HEADER_SIZE);
  return { header, geometry: parseBmpGeometry(header) };
}

/**
 * Whether a cover with `coverCapacityBytes` pixel bytes can hold a secret of
 * `secretSizeBytes` plus container overhead
 */
export function checkCapacity(coverCapacityBytes: number, secretSizeBytes: number): boolean {
  const usableBytes = Math.floor(coverCapacityBytes / CARRIER_BYTES_PER_BYTE);
  return usableBytes >= secretSizeBytes + CAPACITY_OVERHEAD_BYTES;
}

/**
 * Largest secret size `checkCapacity` accepts for this cover
 */
export function calculateCapacity(coverCapacityBytes: number): number {
  const usableBytes = Math.floor(coverCapacityBytes / CARRIER_BYTES_PER_BYTE);
  return Math.max(0, usableBytes - CAPACITY_OVERHEAD_BYTES);
}
