/**
 * Streaming execution shared by all adapters.
 *
 * A worker owns the response body, runs the vendor decoder and publishes
 * canonical events onto a bounded EventQueue that the caller iterates.
 */

import {
  AbortError,
  StreamEventType,
  isTerminalEvent,
  toSDKError,
  type StreamEvent,
} from "../types/index.js";
import type { Logger } from "../logger.js";
import { EventQueue, DEFAULT_QUEUE_CAPACITY } from "../utils/event-queue.js";

export interface RunStreamOptions {
  provider: string;
  /** Caller cancellation. An abort ends the stream with an AbortError event. */
  signal?: AbortSignal;
  capacity?: number;
  logger?: Logger;
}

/**
 * Opens the vendor stream and returns its decoded events. Receives the
 * worker's signal, which aborts when the caller cancels; pass it to the
 * transport and the stream parser so reads stop and the body is released.
 */
export type OpenDecodedStream = (
  signal: AbortSignal,
) => Promise<AsyncIterable<StreamEvent>>;

/**
 * Run `open` on a worker and return the consumer side of its event queue.
 *
 * The returned iterator yields events in wire order and ends with exactly
 * one DONE or ERROR event:
 *   - an exception anywhere in `open` or the decoder becomes an ERROR event;
 *   - events a decoder produces after its terminal event are dropped;
 *   - a decoder that ends without a terminal event gets DONE with 0 tokens.
 *
 * Breaking out of the loop cancels the worker: no further reads happen and
 * the body is cancelled.
 */
export function runStreamingDecode(
  open: OpenDecodedStream,
  options: RunStreamOptions,
): AsyncIterableIterator<StreamEvent> {
  const queue = new EventQueue<StreamEvent>(options.capacity ?? DEFAULT_QUEUE_CAPACITY);
  const controller = new AbortController();
  const log = options.logger;

  const onCallerAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
  }
  queue.onCancel(() => controller.abort());

  const worker = async (): Promise<void> => {
    let terminated = false;
    let emitted = 0;

    const publish = async (event: StreamEvent): Promise<boolean> => {
      if (terminated || controller.signal.aborted) return false;
      const accepted = await queue.push(event);
      if (accepted) emitted++;
      return accepted;
    };

    try {
      if (!controller.signal.aborted) {
        const events = await open(controller.signal);
        for await (const event of events) {
          if (controller.signal.aborted) break;
          if (!(await publish(event))) break;
          if (isTerminalEvent(event)) {
            terminated = true;
            break;
          }
        }
      }
      if (!terminated && !controller.signal.aborted) {
        await publish({ type: StreamEventType.DONE, tokens_used: 0 });
        terminated = true;
      }
    } catch (err: unknown) {
      if (!controller.signal.aborted) {
        await publish({ type: StreamEventType.ERROR, error: toSDKError(err) });
        terminated = true;
      }
    }

    // Caller abort (as opposed to the consumer walking away): tell the
    // consumer why the stream ended.
    if (!terminated && !queue.isCancelled && options.signal?.aborted) {
      const accepted = await queue.push({
        type: StreamEventType.ERROR,
        error: new AbortError(`${options.provider} stream aborted`, {
          cause: options.signal.reason,
        }),
      });
      if (accepted) emitted++;
    }

    options.signal?.removeEventListener("abort", onCallerAbort);
    queue.close();
    log?.debug("Stream closed", {
      provider: options.provider,
      events: emitted,
      cancelled: queue.isCancelled,
    });
  };

  worker().catch((err: unknown) => {
    log?.error("Stream worker failed", err, { provider: options.provider });
    queue.close();
  });

  return queue;
}
