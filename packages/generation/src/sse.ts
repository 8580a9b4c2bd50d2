export interface ByteReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

/**
 * Splits a byte stream of Server-Sent Events into `data:` payloads.
 * Comments, other fields and blank lines are skipped; a trailing line
 * without a newline is still delivered.
 */
export async function* parseSseLines(
  reader: ByteReader,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = "";

  while (true) {
    const { value, done } = await reader.read();
    if (done) {
      break;
    }

    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";

    for (const line of lines) {
      const data = dataOf(line);
      if (data !== undefined) yield data;
    }
  }

  buffer += decoder.decode();
  const data = dataOf(buffer);
  if (data !== undefined) yield data;
}

function dataOf(line: string): string | undefined {
  const trimmed = line.replace(/\r$/, "");
  if (!trimmed.startsWith("data:")) {
    return undefined;
  }
  return trimmed.slice("data:".length).trimStart();
}
