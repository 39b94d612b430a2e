/**
 * Cancellable text reading over a byte stream.
 *
 * Both stream parsers read through `readText`, so an aborted signal or an
 * early `return()` from the consumer always cancels the underlying body and
 * frees the connection.
 */

/**
 * Yield decoded text chunks from `stream` until it ends or `signal` aborts.
 *
 * On abort the pending read resolves as done and iteration stops without
 * throwing; the caller decides what an abort means.
 */
export async function* readText(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncIterableIterator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let finished = false;

  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch(() => undefined);
  };

  if (signal?.aborted) {
    await reader.cancel(signal.reason);
    reader.releaseLock();
    return;
  }
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        const tail = decoder.decode();
        if (tail !== "") yield tail;
        return;
      }
      yield decoder.decode(value, { stream: true });
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!finished) {
      // Consumer stopped early or the read failed: release the connection.
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

/** Read a whole byte stream as text. Used for non-2xx streaming responses. */
export async function readAllText(
  stream: ReadableStream<Uint8Array>,
): Promise<string> {
  let text = "";
  for await (const chunk of readText(stream)) {
    text += chunk;
  }
  return text;
}
