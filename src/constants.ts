// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Transformer Constants
 *
 * Environment variable names and fixed values shared by the resolver
 * and the composer.
 */

export const ENV_VARS = {
  /** YAML document describing the service (metadata.name, spec.replicas) */
  API_CONFIG: 'API_CONFIG',
  /** Decimal replica count used when the document omits spec.replicas */
  REPLICAS: 'REPLICAS',
} as const;

export const RESOLVER_DEFAULTS = {
  /** Replica count when neither the document nor the environment sets one */
  FALLBACK_REPLICAS: 1,
} as const;

export const MANIFEST_CONFIG = {
  /** Appended to the service name to form the `app` label */
  APP_LABEL_SUFFIX: '-cockroachdb',
  /** Blank line plus document boundary, written between upstream and generated resources */
  DOCUMENT_SEPARATOR: '\n---\n',
} as const;
