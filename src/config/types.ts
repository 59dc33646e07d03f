// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for the input document and the resolved parameter set.
 */

/**
 * The configuration document as decoded from YAML.
 * Every field is optional; keys not listed here are ignored.
 *
 * Example:
 * ```yaml
 * metadata:
 *   name: mydb
 * spec:
 *   replicas: 3
 * ```
 */
export interface ApiConfig {
  metadata?: {
    /** Resource and container name */
    name?: string;
  };
  spec?: {
    /** StatefulSet replica count. Absent means "use the default", not zero. */
    replicas?: number;
  };
}

/**
 * Fully resolved parameters handed to the manifest renderer.
 */
export interface ResolvedConfig {
  readonly name: string;
  readonly replicas: number;
}

/**
 * Where to read the configuration document and the replica default from.
 */
export interface ConfigSourceOptions {
  env: NodeJS.ProcessEnv;
  /** Variable holding the YAML document (default API_CONFIG) */
  configEnv?: string;
  /** Variable holding the default replica count (default REPLICAS) */
  replicasEnv?: string;
  /** Read the document from this file instead of the environment */
  configFile?: string;
}
