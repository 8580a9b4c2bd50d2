import { ValidationError } from "@ragline/errors";

export const DEFAULT_MAX_TOP_K = 20;

/**
 * Rejects out-of-contract retrieval input before any collaborator is called.
 */
export function validateRetrievalRequest(
  query: string,
  topK: number,
  maxTopK: number = DEFAULT_MAX_TOP_K,
): void {
  const fields: Record<string, string> = {};

  if (query.trim().length === 0) {
    fields["query"] = "must not be blank";
  }

  if (!Number.isInteger(topK) || topK < 1 || topK > maxTopK) {
    fields["topK"] = `must be an integer between 1 and ${String(maxTopK)}`;
  }

  const failures = Object.entries(fields);
  if (failures.length > 0) {
    const summary = failures.map(([field, reason]) => `${field} ${reason}`).join("; ");
    throw new ValidationError(`Invalid retrieval request: ${summary}`, fields);
  }
}
