/**
 * Writes an answer stream to a Server-Sent Events response: optional leading
 * events, the citations, one `token` event per fragment, then `done`. A
 * failure mid-stream becomes an `error` event; a client disconnect cancels
 * the answer stream.
 *
 * @module @docpilot/api/sse
 */

import { errorMessage, toSSEMessage, type AnswerStream, type StreamEvent } from '@docpilot/rag';
import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';

export function streamAnswer(
  c: Context,
  answer: AnswerStream,
  options: { startedAt: number; label: string; prelude?: StreamEvent[] }
): Response {
  return streamSSE(c, async (stream) => {
    stream.onAbort(() => answer.cancel('Client disconnected'));

    for (const event of options.prelude ?? []) {
      await stream.writeSSE(toSSEMessage(event));
    }
    await stream.writeSSE(toSSEMessage({ type: 'citations', status: answer.status, citations: answer.citations }));

    try {
      for await (const content of answer.fragments) {
        await stream.writeSSE(toSSEMessage({ type: 'token', content }));
      }
      await stream.writeSSE(toSSEMessage({ type: 'done', latencyMs: Date.now() - options.startedAt }));
    } catch (error) {
      console.error(`[${options.label}] Stream failed: ${errorMessage(error)}`);
      await stream.writeSSE(toSSEMessage({ type: 'error', error: errorMessage(error) }));
    }
  });
}
