export type { IDocumentStorage } from "./document-storage.interface.js";
export { S3DocumentStorage } from "./s3-storage.js";
