export {
  embedInBMP,
  extractFromBMP,
  hasEmbeddedData,
  getImageInfo,
  type EmbedOptions,
  type EmbedResult,
  type ExtractOptions,
  type ExtractResult,
  type ImageInfo,
} from './bmp-stego.js';

export {
  packByte,
  unpackByte,
  packUint32,
  unpackUint32,
  packBytes,
  unpackBytes,
  CARRIER_BYTES_PER_BYTE,
  CARRIER_BYTES_PER_UINT32,
} from './bit-codec.js';

export {
  ContainerWriter,
  ContainerReader,
  containerCarrierBytes,
  isFileExtension,
  SIGNATURE,
  MAX_EXTENSION_LENGTH,
  EXTENSION_BUFFER_SIZE,
} from './container.js';

export {
  checkCapacity,
  calculateCapacity,
  parseBmpGeometry,
  readBmpGeometry,
  BMP_HEADER_SIZE,
  CAPACITY_OVERHEAD_BYTES,
  type BmpGeometry,
} from './capacity.js';

export {
  FileByteSource,
  FileByteSink,
  BufferByteSource,
  BufferByteSink,
  FileScope,
  type ByteSource,
  type ByteSink,
} from './carrier-stream.js';

export {
  resolveOutputFilename,
  secretExtension,
  DEFAULT_STEGO_NAME,
  DEFAULT_DECODED_STEM,
} from './naming.js';

export {
  StegoError,
  isStegoError,
  toStegoError,
  describeStage,
  type StegoErrorKind,
  type StegoStage,
} from './errors.js';

export { silentReporter, type StegoReporter } from './reporter.js';
