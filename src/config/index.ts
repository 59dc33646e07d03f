// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * Turns the loosely typed configuration document into a ResolvedConfig:
 *
 * - types.ts     - Type definitions (ApiConfig, ResolvedConfig, ConfigSourceOptions)
 * - loader.ts    - Reading the document and replica default from env or file
 * - parser.ts    - Permissive YAML decoding
 * - validator.ts - Replica default parsing and advisory checks
 * - merger.ts    - Defaulting with precedence handling
 *
 * Usage:
 *   import { loadConfigText, resolveConfig } from './config/index.js';
 */

export type { ApiConfig, ResolvedConfig, ConfigSourceOptions } from './types.js';

export { loadConfigText, readReplicaDefault } from './loader.js';

export { parseApiConfig } from './parser.js';

export { parseReplicaDefault, validateResolvedConfig } from './validator.js';

export { resolveReplicas, mergeConfig, resolveConfig } from './merger.js';
export type { ReplicaResolution } from './merger.js';
