import crypto from "node:crypto";
import { v5 as uuidv5 } from "uuid";
import { ValidationError } from "@ragline/errors";

const DOCUMENT_ID_ALGORITHM = "sha256";
const DOCUMENT_ID_LENGTH = 16;

/** RFC 4122 DNS namespace; chunk ids are name-based UUIDs within it. */
export const CHUNK_ID_NAMESPACE = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";

/**
 * Stable document identifier: the first 16 hex characters of SHA-256 over
 * the logical key, with the storage prefix removed from its start.
 * The same document under a different bucket prefix keeps its id.
 */
export function documentId(logicalKey: string, prefix = ""): string {
  const relative = prefix && logicalKey.startsWith(prefix) ? logicalKey.slice(prefix.length) : logicalKey;
  return crypto
    .createHash(DOCUMENT_ID_ALGORITHM)
    .update(relative, "utf8")
    .digest("hex")
    .slice(0, DOCUMENT_ID_LENGTH);
}

/**
 * Deterministic point id for the chunk at `index` of a document.
 * Re-ingesting a document reproduces the same ids, so upserts overwrite.
 */
export function chunkId(docId: string, index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new ValidationError("Chunk index must be a non-negative integer", {
      index: String(index),
    });
  }
  return uuidv5(`${docId}_chunk_${index}`, CHUNK_ID_NAMESPACE);
}

/** Last `/` segment of a storage key. */
export function filenameFromKey(key: string): string {
  const slash = key.lastIndexOf("/");
  return slash === -1 ? key : key.slice(slash + 1);
}
