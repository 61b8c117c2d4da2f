/**
 * Converts the binary shape an SDK returns into a Node Buffer.
 * Depending on version, HTTP SDKs hand back a Buffer, Uint8Array,
 * ArrayBuffer, Readable stream or fetch-like binary response.
 */

interface BinaryResponse {
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === 'function'
  );
}

function isBinaryResponse(value: unknown): value is BinaryResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'arrayBuffer' in value &&
    typeof value.arrayBuffer === 'function'
  );
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'binary');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  if (chunk instanceof ArrayBuffer) {
    return Buffer.from(chunk);
  }
  throw new Error(`Unsupported audio chunk type: ${typeof chunk}`);
}

export async function toAudioBuffer(result: unknown): Promise<Buffer> {
  if (Buffer.isBuffer(result)) {
    return result;
  }

  if (result instanceof Uint8Array || result instanceof ArrayBuffer) {
    return chunkToBuffer(result);
  }

  // Readable streams are async iterable; check before arrayBuffer()
  if (isAsyncIterable(result)) {
    const chunks: Buffer[] = [];
    for await (const chunk of result) {
      chunks.push(chunkToBuffer(chunk));
    }
    return Buffer.concat(chunks);
  }

  if (isBinaryResponse(result)) {
    return Buffer.from(await result.arrayBuffer());
  }

  throw new Error('Unsupported audio response from synthesis engine');
}
