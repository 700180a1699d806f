import type { ResponseStream } from '@aws-sdk/client-bedrock-runtime';
import { parseFrame } from './sse.js';

/**
 * Decode a Bedrock response stream into its JSON payloads.
 *
 * The SDK has already split the binary event-stream framing into union members; only
 * `chunk` carries data. Exception members end the stream with that exception, and any
 * other member is treated as an unknown event.
 */
export async function* decodeEventStream(
  events: AsyncIterable<ResponseStream>
): AsyncGenerator<unknown, void, undefined> {
  const decoder = new TextDecoder('utf-8');

  for await (const event of events) {
    if (event.chunk) {
      const bytes = event.chunk.bytes;
      if (bytes && bytes.length > 0) {
        yield parseFrame(decoder.decode(bytes));
      }
      continue;
    }

    const failure =
      event.internalServerException ??
      event.modelStreamErrorException ??
      event.validationException ??
      event.throttlingException ??
      event.modelTimeoutException;
    if (failure) throw failure;

    const name = event.$unknown?.[0] ?? Object.keys(event).join(',');
    throw new Error(`unknown event type: ${name}`);
  }
}
