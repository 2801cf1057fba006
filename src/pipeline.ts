import type { ServerResponse } from 'http';
import { parseSseLine } from './envelope.js';
import { StreamWriteError, toError } from './errors.js';
import { structuredLog } from './logger.js';
import { BoundedQueue } from './queue.js';
import type { StreamRenderer } from './stream.js';
import { safeWrite } from './utils.js';

export const KEEPALIVE_FRAME = ': keepalive\n\n';

export interface FrameSink {
  readonly writable: boolean;
  /** Resolves once the frame is accepted; rejects with StreamWriteError when the client is gone. */
  write(frame: string): Promise<void>;
}

export function responseSink(res: ServerResponse): FrameSink {
  const sink: FrameSink = {
    get writable() {
      return !res.destroyed && res.writable;
    },
    write(frame) {
      if (!sink.writable) return Promise.reject(new StreamWriteError());
      if (safeWrite(res, frame)) return Promise.resolve();
      if (!sink.writable) return Promise.reject(new StreamWriteError());
      return new Promise<void>((resolve, reject) => {
        const cleanup = () => {
          res.off('drain', onDrain);
          res.off('close', onClose);
        };
        const onDrain = () => {
          cleanup();
          resolve();
        };
        const onClose = () => {
          cleanup();
          reject(new StreamWriteError());
        };
        res.once('drain', onDrain);
        res.once('close', onClose);
      });
    },
  };
  return sink;
}

export interface PipelineOptions<E> {
  /** Raw upstream lines, in arrival order. */
  source: AsyncIterable<string>;
  classify: (payload: string) => E[];
  renderer: StreamRenderer<E>;
  sink: FrameSink;
  queueDepth: number;
  keepaliveIntervalMs: number;
  signal: AbortSignal;
  requestId?: string;
  debugSse?: boolean;
  /** Frames written before the closing frames when the upstream read fails. */
  errorFrames?: (error: Error) => string[];
  /** Called once when the stream is cancelled, to abandon the upstream read. */
  onCancel?: () => void;
}

export interface PipelineResult {
  cancelled: boolean;
  upstreamError?: Error;
  framesWritten: number;
}

/**
 * Runs one streamed response as four stages joined by bounded queues:
 * read upstream lines, classify payloads, render frames, write to the client.
 * A full queue stalls the stages before it. Keepalive comments are sent only
 * until the first upstream line arrives.
 */
export async function runStreamPipeline<E>(options: PipelineOptions<E>): Promise<PipelineResult> {
  const { source, classify, renderer, sink, signal, requestId } = options;
  const lines = new BoundedQueue<string>(options.queueDepth);
  const events = new BoundedQueue<E>(options.queueDepth);
  const frames = new BoundedQueue<string>(options.queueDepth);

  // shared by the stage closures below
  const state: PipelineResult = { cancelled: false, framesWritten: 0 };

  const cancel = () => {
    if (state.cancelled) return;
    state.cancelled = true;
    const reason = new StreamWriteError();
    lines.abort(reason);
    events.abort(reason);
    frames.abort(reason);
    options.onCancel?.();
  };

  const keepalive = setInterval(() => {
    frames.offer(KEEPALIVE_FRAME);
  }, options.keepaliveIntervalMs);
  keepalive.unref();

  if (signal.aborted) cancel();
  signal.addEventListener('abort', cancel, { once: true });

  // A stage that fails for any reason other than cancellation records the
  // error and closes its output so downstream stages still finish the stream.
  const fail = (stage: string, err: unknown, output: { close(): void }) => {
    if (state.cancelled) return;
    const error = toError(err);
    state.upstreamError ??= error;
    structuredLog('warn', 'Stream', `${stage} stage failed: ${error.message}`, { requestId });
    output.close();
  };

  const reader = (async () => {
    try {
      let first = true;
      for await (const line of source) {
        if (first) {
          first = false;
          clearInterval(keepalive);
        }
        if (options.debugSse) structuredLog('debug', 'SSE', `upstream: ${line}`, { requestId });
        await lines.push(line);
      }
      lines.close();
    } catch (err) {
      fail('read', err, lines);
    } finally {
      clearInterval(keepalive);
    }
  })();

  const classifier = (async () => {
    try {
      let finished = false;
      for await (const line of lines) {
        // keep draining after [DONE] so the reader never blocks on a full queue
        if (finished) continue;
        const parsed = parseSseLine(line);
        if (parsed.kind === 'done') {
          finished = true;
        } else if (parsed.kind === 'data') {
          for (const event of classify(parsed.payload)) await events.push(event);
        }
      }
      events.close();
    } catch (err) {
      fail('classify', err, events);
      lines.close();
    }
  })();

  const rendering = (async () => {
    try {
      for await (const event of events) {
        for (const frame of renderer.render(event)) await frames.push(frame);
      }
      const upstreamError = state.upstreamError;
      if (upstreamError && options.errorFrames) {
        for (const frame of options.errorFrames(upstreamError)) await frames.push(frame);
      }
      for (const frame of renderer.finish()) await frames.push(frame);
      frames.close();
    } catch (err) {
      fail('render', err, frames);
      events.close();
    }
  })();

  try {
    for await (const frame of frames) {
      await sink.write(frame);
      state.framesWritten++;
      if (options.debugSse) structuredLog('debug', 'SSE', `client: ${frame.trimEnd()}`, { requestId });
    }
  } catch (err) {
    const error = toError(err);
    if (!(error instanceof StreamWriteError)) {
      structuredLog('warn', 'Stream', `write failed: ${error.message}`, { requestId });
    }
    cancel();
  } finally {
    clearInterval(keepalive);
    signal.removeEventListener('abort', cancel);
    await Promise.all([reader, classifier, rendering]);
  }

  return state;
}
