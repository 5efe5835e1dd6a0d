import path from 'path';
import { EXTENSION_BUFFER_SIZE, isFileExtension, isPrintableAscii } from './container.js';
import { StegoError } from './errors.js';

export const DEFAULT_STEGO_NAME = 'stego.bmp';
export const DEFAULT_DECODED_STEM = 'decoded';

/**
 * Extension stored for a secret file: its base name from the last dot on,
 * dot included ("report.final.pdf" -> ".pdf")
 */
export function secretExtension(secretPath: string): string {
  const name = path.basename(secretPath);
  const dot = name.lastIndexOf('.');

  if (dot < 0 || dot === name.length - 1) {
    throw new StegoError('ArgumentError', `Secret file "${name}" has no extension`, {
      stage: 'extension',
    });
  }

  const extension = name.slice(dot);
  const bytes = Buffer.from(extension, 'utf-8');
  if (!isPrintableAscii(bytes)) {
    throw new StegoError('ArgumentError', `Extension "${extension}" must be printable ASCII`, {
      stage: 'extension',
    });
  }
  if (!isFileExtension(bytes)) {
    throw new StegoError('ArgumentError', `Extension "${extension}" must not contain path separators`, {
      stage: 'extension',
    });
  }
  if (extension.length >= EXTENSION_BUFFER_SIZE) {
    throw new StegoError(
      'ExtensionTooLong',
      `Extension "${extension}" is longer than ${EXTENSION_BUFFER_SIZE - 1} characters`,
      { stage: 'extension' }
    );
  }

  return extension;
}

/**
 * Final name for a decoded secret. The user's name loses everything from its
 * first dot; an absent name, or one made only of dots, falls back to the
 * default stem. The decoded extension is appended. Directories are kept.
 */
export function resolveOutputFilename(
  baseName: string | undefined,
  extension: string,
  defaultStem: string = DEFAULT_DECODED_STEM
): string {
  if (!baseName) {
    return defaultStem + extension;
  }

  const name = path.basename(baseName);
  const stem = name.split('.').find((token) => token.length > 0) ?? defaultStem;

  if (name === baseName) {
    return stem + extension;
  }
  return path.join(path.dirname(baseName), stem + extension);
}
