// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Resolves the parsed document against its defaults.
 * Replica priority: document spec.replicas > environment default > fallback (1)
 */

import { RESOLVER_DEFAULTS } from '../constants.js';
import { logger, type ReplicaSource } from '../logger.js';
import { parseApiConfig } from './parser.js';
import type { ApiConfig, ResolvedConfig } from './types.js';
import { parseReplicaDefault } from './validator.js';

/**
 * A resolved replica count together with where it came from.
 */
export interface ReplicaResolution {
  replicas: number;
  source: ReplicaSource;
}

/**
 * Pick the replica count. The environment default is only parsed when the
 * document leaves replicas unset.
 * @param variable - Name of the environment variable, for error messages
 */
export function resolveReplicas(
  explicit: number | undefined,
  replicaDefault: string | undefined,
  variable?: string
): ReplicaResolution {
  if (explicit !== undefined) {
    return { replicas: explicit, source: 'document' };
  }
  if (replicaDefault !== undefined && replicaDefault !== '') {
    return { replicas: parseReplicaDefault(replicaDefault, variable), source: 'environment' };
  }
  return { replicas: RESOLVER_DEFAULTS.FALLBACK_REPLICAS, source: 'fallback' };
}

/**
 * Merge a parsed document with the environment default.
 * The result is frozen.
 */
export function mergeConfig(
  document: ApiConfig,
  replicaDefault?: string,
  variable?: string
): ResolvedConfig {
  const { replicas, source } = resolveReplicas(document.spec?.replicas, replicaDefault, variable);
  const config: ResolvedConfig = Object.freeze({
    name: document.metadata?.name ?? '',
    replicas,
  });
  logger.resolvedConfig(config, source);
  return config;
}

/**
 * Parse a configuration document and resolve it in one step.
 */
export function resolveConfig(text: string, replicaDefault?: string, variable?: string): ResolvedConfig {
  return mergeConfig(parseApiConfig(text), replicaDefault, variable);
}
