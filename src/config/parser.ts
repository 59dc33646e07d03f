// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Parser
 *
 * Decodes the YAML configuration document and extracts the two recognized
 * fields. Unknown keys are ignored so that superset documents keep working.
 */

import { CORE_SCHEMA, FAILSAFE_SCHEMA, loadAll } from 'js-yaml';
import { ParseError } from '../errors.js';
import type { ApiConfig } from './types.js';

type YamlMapping = Record<string, unknown>;

const BLANK_OR_COMMENT = /^\s*(#.*)?$/;

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeKind(value: unknown): string {
  if (Array.isArray(value)) return 'a sequence';
  if (isMapping(value)) return 'a mapping';
  if (typeof value === 'string') return `the string "${value}"`;
  return `${typeof value} ${String(value)}`;
}

/**
 * Read an optional nested section. `null` counts as absent.
 */
function readSection(root: YamlMapping, key: string): YamlMapping | undefined {
  const value = root[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isMapping(value)) {
    throw new ParseError(`${key} must be a mapping, got ${describeKind(value)}`);
  }
  return value;
}

/**
 * Whether the text holds anything besides blank lines and comments.
 */
function hasContent(text: string): boolean {
  return text.split(/\r?\n/).some((line) => !BLANK_OR_COMMENT.test(line));
}

/**
 * metadata.name exactly as written, from a decode that keeps every scalar
 * a string. Undefined when the name carries an explicit tag the failsafe
 * schema does not know (e.g. `!!int 42`).
 */
function readNameSource(text: string): string | undefined {
  let documents: unknown[];
  try {
    documents = loadAll(text, null, { schema: FAILSAFE_SCHEMA });
  } catch {
    return undefined;
  }
  const root = documents[0];
  if (!isMapping(root) || !isMapping(root.metadata)) {
    return undefined;
  }
  const name = root.metadata.name;
  return typeof name === 'string' ? name : undefined;
}

function readName(metadata: YamlMapping | undefined, text: string): string | undefined {
  const value = metadata?.name;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  // `042`, `1.0` or `true` keep their source text, not the decoded number
  if (typeof value === 'number' || typeof value === 'boolean') {
    return readNameSource(text) ?? String(value);
  }
  throw new ParseError(`metadata.name must be a string, got ${describeKind(value)}`);
}

/**
 * spec.replicas as a YAML integer. Fractional values such as `2.5` are
 * rejected rather than truncated, and so are integers outside the safe
 * integer range, which a JS number cannot hold exactly.
 */
function readReplicas(spec: YamlMapping | undefined): number | undefined {
  const value = spec?.replicas;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new ParseError(`spec.replicas must be an integer, got ${describeKind(value)}`);
  }
  return value;
}

/**
 * Parse a configuration document.
 * Only the first document of a multi-document string is read.
 */
export function parseApiConfig(text: string): ApiConfig {
  let documents: unknown[];
  try {
    documents = loadAll(text, null, { schema: CORE_SCHEMA });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`invalid configuration document: ${message}`, { cause: error });
  }

  if (documents.length === 0 || !hasContent(text)) {
    throw new ParseError('configuration document is empty');
  }

  // `~` or a bare `---` is a document whose value is null
  const root = documents[0];
  if (root === null || root === undefined) {
    return {};
  }
  if (!isMapping(root)) {
    throw new ParseError(`configuration document must be a mapping, got ${describeKind(root)}`);
  }

  const metadata = readSection(root, 'metadata');
  const spec = readSection(root, 'spec');

  const config: ApiConfig = {};
  if (metadata) {
    config.metadata = {};
    const name = readName(metadata, text);
    if (name !== undefined) config.metadata.name = name;
  }
  if (spec) {
    config.spec = {};
    const replicas = readReplicas(spec);
    if (replicas !== undefined) config.spec.replicas = replicas;
  }
  return config;
}
