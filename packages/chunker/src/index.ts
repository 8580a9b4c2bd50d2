export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
