import { z } from "zod";
import type { ChunkPayload } from "@ragline/types";
import { IndexError } from "@ragline/errors";

const chunkPayloadSchema = z.object({
  filename: z.string(),
  documentId: z.string(),
  fileSize: z.number(),
  processedAt: z.string(),
  text: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  storedAt: z.string(),
});

/** Validates a payload read back from the index. */
export function toChunkPayload(pointId: string, payload: unknown): ChunkPayload {
  const parsed = chunkPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new IndexError(`Point ${pointId} has a malformed payload`, { cause: parsed.error });
  }
  return parsed.data;
}
