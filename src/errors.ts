// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Transformer Errors
 *
 * Every failure is terminal for the invocation. The CLI prints the message
 * and exits non-zero; nothing is retried.
 */

/**
 * Error categories, one per failure class.
 */
export enum ErrorCode {
  PARSE = 'PARSE_ERROR',
  INVALID_DEFAULT = 'INVALID_DEFAULT',
  CONFIG_SOURCE = 'CONFIG_SOURCE',
  STREAM_COPY = 'STREAM_COPY',
  RENDER = 'RENDER_ERROR',
}

/**
 * Base class for all transformer failures.
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransformError';
  }
}

/**
 * The configuration document is not valid YAML, or a recognized field has
 * the wrong shape.
 */
export class ParseError extends TransformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.PARSE, options);
    this.name = 'ParseError';
  }
}

/**
 * The environment replica default is set but is not a decimal integer.
 */
export class InvalidDefaultError extends TransformError {
  constructor(
    public readonly value: string,
    public readonly variable?: string
  ) {
    const source = variable ? `${variable}=` : '';
    super(`invalid replica count ${source}"${value}": expected a decimal integer`, ErrorCode.INVALID_DEFAULT);
    this.name = 'InvalidDefaultError';
  }
}

/**
 * The configuration file named on the command line could not be read.
 */
export class ConfigSourceError extends TransformError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCode.CONFIG_SOURCE, options);
    this.name = 'ConfigSourceError';
  }
}

/**
 * Where in the output sequence a stream failure happened.
 */
export type StreamPhase = 'passthrough' | 'separator' | 'manifests';

/**
 * Relaying the upstream stream, or writing to the sink, failed.
 */
export class StreamCopyError extends TransformError {
  constructor(
    message: string,
    public readonly phase: StreamPhase,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCode.STREAM_COPY, options);
    this.name = 'StreamCopyError';
  }
}

/**
 * Rendering was handed a config that breaks the resolver's guarantees.
 * Indicates a programming error, not bad user input.
 */
export class RenderError extends TransformError {
  constructor(message: string) {
    super(message, ErrorCode.RENDER);
    this.name = 'RenderError';
  }
}

/**
 * Format any thrown value as a one-line diagnostic.
 */
export function describeError(error: unknown): string {
  if (error instanceof RenderError) {
    return `internal error: ${error.message}`;
  }
  if (error instanceof TransformError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
