export interface SSEEvent {
  event?: string;
  data: string;
}

export const SSE_DONE = '[DONE]';

/**
 * Group lines into Server-Sent Events.
 *
 * A blank line dispatches the pending event. Multiple `data:` lines are joined with
 * `\n`, comment lines (leading `:`) and fields other than `event`/`data` are ignored.
 * An event still pending at EOF is dispatched as well.
 */
export async function* parseSSE(lines: AsyncIterable<string>): AsyncGenerator<SSEEvent, void, undefined> {
  let event: string | undefined;
  let data: string[] = [];

  for await (const line of lines) {
    if (line === '') {
      if (data.length > 0) {
        yield event === undefined ? { data: data.join('\n') } : { event, data: data.join('\n') };
      }
      event = undefined;
      data = [];
      continue;
    }

    if (line.startsWith(':')) continue;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'data') {
      data.push(value);
    } else if (field === 'event') {
      event = value;
    }
  }

  if (data.length > 0) {
    yield event === undefined ? { data: data.join('\n') } : { event, data: data.join('\n') };
  }
}

/**
 * Parse the JSON payload of each SSE event until the `[DONE]` sentinel.
 * A payload that is not valid JSON fails the stream.
 */
export async function* parseSSEJson(
  lines: AsyncIterable<string>
): AsyncGenerator<unknown, void, undefined> {
  for await (const { data } of parseSSE(lines)) {
    const payload = data.trim();
    if (payload === SSE_DONE) return;
    if (!payload) continue;
    yield parseFrame(payload);
  }
}

export class MalformedFrameError extends Error {
  constructor(
    message: string,
    public readonly frame: string
  ) {
    super(message);
    this.name = 'MalformedFrameError';
  }
}

export function parseFrame(frame: string): unknown {
  try {
    return JSON.parse(frame) as unknown;
  } catch {
    throw new MalformedFrameError(`Malformed stream frame: ${frame.slice(0, 200)}`, frame);
  }
}
