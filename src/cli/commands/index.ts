export { encodeCommand, isBmpPath, type EncodeCommandOptions } from './encode.js';
export { decodeCommand, type DecodeCommandOptions } from './decode.js';
export { infoCommand } from './info.js';
