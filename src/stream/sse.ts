/**
 * Server-Sent Events framing and a backpressure-aware frame writer.
 */

import { Writable } from 'stream';
import { StreamEvent } from './events';

/** Response headers for an event stream. */
export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
};

/**
 * Render a message as one SSE frame. Each line of the message becomes
 * its own `data:` field, so the frame never contains a blank line
 * before its terminator.
 */
export function formatSseFrame(message: string): string {
  return message
    .split(/\r\n|\r|\n/)
    .map((line) => `data: ${line}\n`)
    .join('') + '\n';
}

/** Frame text of a stream event. Only the message reaches the client. */
export function formatEvent(event: StreamEvent): string {
  return formatSseFrame(event.message);
}

/**
 * Write a frame, waiting for `drain` when the socket buffer is full.
 * Resolves `false` if the stream closed before the frame could be flushed.
 */
export function writeFrame(stream: Writable, frame: string): Promise<boolean> {
  if (stream.destroyed || stream.writableEnded) return Promise.resolve(false);
  if (stream.write(frame)) return Promise.resolve(true);

  return new Promise((resolve) => {
    const onDrain = () => {
      cleanup();
      resolve(true);
    };
    const onClose = () => {
      cleanup();
      resolve(false);
    };
    const cleanup = () => {
      stream.off('drain', onDrain);
      stream.off('close', onClose);
    };
    stream.on('drain', onDrain);
    stream.on('close', onClose);
  });
}
