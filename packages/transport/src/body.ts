const decoder = new TextDecoder('utf-8');

/**
 * A body with no bytes.
 */
export async function* emptyBody(): AsyncGenerator<Uint8Array> {
  // nothing to yield
}

/**
 * A body that yields the given chunks in order.
 */
export async function* bodyFromChunks(
  chunks: readonly (Uint8Array | string)[]
): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const chunk of chunks) {
    yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
  }
}

/**
 * Iterate a web ReadableStream chunk by chunk.
 * The reader lock is released when iteration ends, including on early exit.
 */
export async function* readWebStream(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Read a body to completion and concatenate it into one buffer.
 */
export async function drainBody(body: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let length = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    length += chunk.byteLength;
  }

  const [only] = chunks;
  if (chunks.length === 1 && only) {
    return only;
  }

  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Decode bytes as UTF-8 text. Invalid sequences become U+FFFD.
 */
export function decodeBody(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
