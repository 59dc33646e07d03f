// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Stream Composer
 *
 * Writes the upstream resources through unchanged, then a document
 * separator, then the generated CockroachDB resources. Upstream documents
 * always come first so later documents can refer to them.
 */

import { Transform, type Readable, type TransformCallback, type Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { MANIFEST_CONFIG } from '../constants.js';
import type { ResolvedConfig } from '../config/types.js';
import { StreamCopyError, type StreamPhase } from '../errors.js';
import { logger } from '../logger.js';
import { renderManifests } from './renderer.js';
import { MANIFEST_TEMPLATE } from './template.js';

export const DOCUMENT_SEPARATOR = MANIFEST_CONFIG.DOCUMENT_SEPARATOR;

export interface ComposeOptions {
  /** Upstream resource stream, read to completion */
  input: Readable;
  /** Output sink; left open when composition finishes */
  output: Writable;
  config: ResolvedConfig;
  template?: string;
}

/**
 * Pass-through that counts the bytes it relays.
 */
class ByteCounter extends Transform {
  bytes = 0;

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    callback(null, chunk);
  }
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function writeChunk(output: Writable, chunk: string, phase: StreamPhase): Promise<void> {
  return new Promise((resolve, reject) => {
    const fail = (error: Error): void => {
      reject(new StreamCopyError(`Failed to write ${phase}: ${error.message}`, phase, { cause: error }));
    };
    // A failed write also emits 'error' on the sink after the callback runs
    output.once('error', fail);
    output.write(chunk, (error) => {
      if (error) {
        fail(error);
        return;
      }
      output.off('error', fail);
      logger.streamStats(phase, Buffer.byteLength(chunk));
      resolve();
    });
  });
}

/**
 * Copy `input` to `output` without ending `output`.
 */
export async function copyUpstream(input: Readable, output: Writable): Promise<number> {
  const counter = new ByteCounter();
  try {
    await pipeline(input, counter, output, { end: false });
  } catch (error) {
    throw new StreamCopyError(`Failed to copy upstream resources: ${reason(error)}`, 'passthrough', {
      cause: error,
    });
  }
  logger.streamStats('passthrough', counter.bytes);
  return counter.bytes;
}

/**
 * Compose upstream + separator + rendered manifests onto `output`.
 * Rendering happens before anything is written, so a render failure
 * leaves the sink untouched.
 */
export async function composeStream(options: ComposeOptions): Promise<void> {
  const manifests = renderManifests(options.config, options.template ?? MANIFEST_TEMPLATE);

  await copyUpstream(options.input, options.output);
  await writeChunk(options.output, DOCUMENT_SEPARATOR, 'separator');
  await writeChunk(options.output, manifests, 'manifests');
}
