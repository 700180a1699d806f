/**
 * Split a byte or text stream into lines.
 *
 * Chunk boundaries from the network rarely line up with line boundaries, so partial
 * lines are buffered until their newline arrives. Bytes go through a streaming
 * TextDecoder, which keeps multi-byte characters intact across chunks. A trailing
 * `\r` is dropped, and a final line without a newline is emitted at EOF.
 */
export async function* splitLines(
  source: AsyncIterable<Uint8Array | string>
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const chunk of source) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    for (const line of lines) {
      yield stripCarriageReturn(line);
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield stripCarriageReturn(buffer);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
