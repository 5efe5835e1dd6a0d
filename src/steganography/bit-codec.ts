import { StegoError } from './errors.js';

/**
 * One hidden bit per carrier byte, always in the carrier's least significant
 * bit. Bit 0 of a value goes into the first carrier byte, bit 7 (or bit 31)
 * into the last. The order is part of the wire format.
 */
export const CARRIER_BYTES_PER_BYTE = 8;
export const CARRIER_BYTES_PER_UINT32 = 32;

const MAX_UINT32 = 0xffffffff;

function ensureCarrier(carrier: Uint8Array, offset: number, needed: number): void {
  if (!Number.isInteger(offset) || offset < 0 || carrier.length - offset < needed) {
    throw new StegoError(
      'InvalidInput',
      `Carrier needs ${needed} bytes from offset ${offset}, has ${Math.max(0, carrier.length - offset)}`
    );
  }
}

function packBits(value: number, bitCount: number, carrier: Uint8Array, offset: number): void {
  for (let i = 0; i < bitCount; i++) {
    const bit = (value >>> i) & 1;
    carrier[offset + i] = (carrier[offset + i] & 0xfe) | bit;
  }
}

function unpackBits(bitCount: number, carrier: Uint8Array, offset: number): number {
  let value = 0;
  for (let i = 0; i < bitCount; i++) {
    value = (value | ((carrier[offset + i] & 1) << i)) >>> 0;
  }
  return value;
}

/**
 * Hide one byte in the LSBs of 8 carrier bytes, in place
 */
export function packByte(value: number, carrier: Uint8Array, offset: number = 0): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new StegoError('InvalidInput', `Not a byte value: ${value}`);
  }
  ensureCarrier(carrier, offset, CARRIER_BYTES_PER_BYTE);
  packBits(value, CARRIER_BYTES_PER_BYTE, carrier, offset);
}

/**
 * Recover one byte from the LSBs of 8 carrier bytes
 */
export function unpackByte(carrier: Uint8Array, offset: number = 0): number {
  ensureCarrier(carrier, offset, CARRIER_BYTES_PER_BYTE);
  return unpackBits(CARRIER_BYTES_PER_BYTE, carrier, offset);
}

/**
 * Hide an unsigned 32-bit integer in the LSBs of 32 carrier bytes, in place
 */
export function packUint32(value: number, carrier: Uint8Array, offset: number = 0): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
    throw new StegoError('InvalidInput', `Not an unsigned 32-bit value: ${value}`);
  }
  ensureCarrier(carrier, offset, CARRIER_BYTES_PER_UINT32);
  packBits(value, CARRIER_BYTES_PER_UINT32, carrier, offset);
}

export function unpackUint32(carrier: Uint8Array, offset: number = 0): number {
  ensureCarrier(carrier, offset, CARRIER_BYTES_PER_UINT32);
  return unpackBits(CARRIER_BYTES_PER_UINT32, carrier, offset);
}

/**
 * Hide a run of bytes; byte n lands at offset + 8n
 */
export function packBytes(data: Uint8Array, carrier: Uint8Array, offset: number = 0): void {
  ensureCarrier(carrier, offset, data.length * CARRIER_BYTES_PER_BYTE);
  for (let i = 0; i < data.length; i++) {
    packBits(data[i], CARRIER_BYTES_PER_BYTE, carrier, offset + i * CARRIER_BYTES_PER_BYTE);
  }
}

export function unpackBytes(carrier: Uint8Array, count: number, offset: number = 0): Buffer {
  ensureCarrier(carrier, offset, count * CARRIER_BYTES_PER_BYTE);
  const data = Buffer.alloc(count);
  for (let i = 0; i < count; i++) {
    data[i] = unpackBits(CARRIER_BYTES_PER_BYTE, carrier, offset + i * CARRIER_BYTES_PER_BYTE);
  }
  return data;
}
