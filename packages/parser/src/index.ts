export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { DoclingParser } from "./docling-parser.js";
export type { DoclingParserOptions } from "./docling-parser.js";
export { ParserRegistry, mimeTypeForKey } from "./registry.js";
