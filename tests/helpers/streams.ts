// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * In-process stream stand-ins for stdin and stdout.
 */

import { Readable, Writable } from 'node:stream';

/**
 * Writable that keeps every chunk it receives.
 */
export class MemorySink extends Writable {
  readonly chunks: Buffer[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

/**
 * Writable whose every write fails.
 */
export class BrokenSink extends Writable {
  _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback(new Error('write EPIPE'));
  }
}

/**
 * Readable yielding the given chunks as buffers.
 */
export function upstream(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk, 'utf-8')));
}

/**
 * Readable that yields one chunk and then fails.
 */
export function failingUpstream(first: string, message: string): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(Buffer.from(first, 'utf-8'));
        return;
      }
      this.destroy(new Error(message));
    },
  });
}
