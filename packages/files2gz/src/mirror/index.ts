export { CompressionHandler } from './event-handler.js';
export { DirectoryMaterializer } from './materializer.js';
export { mapTargetPaths, isSameOrDescendant } from './path-mapper.js';
export { compressFile, syncDirectory } from './transfer.js';
export type { TransferOptions } from './transfer.js';
