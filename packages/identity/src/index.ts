export { documentId, chunkId, filenameFromKey, CHUNK_ID_NAMESPACE } from "./identity.js";
