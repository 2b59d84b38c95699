/**
 * Server-Sent Events reassembly.
 *
 * Network chunks split events at arbitrary byte positions. The scanner
 * keeps the trailing partial line in its buffer and only hands out
 * complete `data:` payloads:
 *
 *   buffer ──push(chunk)──▶ split on '\n' ──▶ complete lines ──▶ data payloads
 *      ▲                                          │
 *      └──────────── trailing partial line ───────┘
 */

export class SseLineScanner {
  private buffer = '';

  /** Text held back waiting for its newline */
  get pending(): string {
    return this.buffer;
  }

  /**
   * Feed a decoded chunk; returns the data payloads of every line it
   * completed.
   */
  push(chunk: string): string[] {
    this.buffer += chunk;
    const payloads: string[] = [];

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      const payload = parseDataLine(line);
      if (payload !== undefined) {
        payloads.push(payload);
      }
      newline = this.buffer.indexOf('\n');
    }

    return payloads;
  }

  /**
   * End of stream: treat whatever is buffered as a final line.
   */
  flush(): string[] {
    const rest = this.buffer.replace(/\r$/, '');
    this.buffer = '';
    const payload = parseDataLine(rest);
    return payload === undefined ? [] : [payload];
  }
}

/**
 * Payload of a `data:` line, or undefined for comments, other fields and
 * blank lines.
 */
export function parseDataLine(line: string): string | undefined {
  if (!line.startsWith('data:')) {
    return undefined;
  }
  const value = line.slice(5);
  return value.startsWith(' ') ? value.slice(1) : value;
}

/**
 * Decode a byte stream and yield each data payload as soon as its line
 * completes. Cancelling iteration releases the reader.
 */
export async function* readSsePayloads(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const scanner = new SseLineScanner();
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield* scanner.push(decoder.decode(value, { stream: true }));
    }
    finished = true;
    yield* scanner.push(decoder.decode());
    yield* scanner.flush();
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}
