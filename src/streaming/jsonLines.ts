import { parseFrame } from './sse.js';

export interface JsonLinesOptions {
  /** Fixed prefix every payload line carries, e.g. `data: ` */
  prefix?: string;
}

/**
 * Newline-delimited JSON, optionally behind a fixed line prefix.
 * Lines no longer than the prefix carry no payload and are skipped.
 */
export async function* parseJsonLines(
  lines: AsyncIterable<string>,
  options: JsonLinesOptions = {}
): AsyncGenerator<unknown, void, undefined> {
  const prefix = options.prefix ?? '';

  for await (const line of lines) {
    if (line.trim().length <= prefix.length) continue;
    if (prefix && !line.startsWith(prefix)) continue;
    yield parseFrame(line.slice(prefix.length));
  }
}
