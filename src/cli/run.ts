// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Transform runner: resolve the configuration, then compose the output
 * stream. Resolution finishes before stdin is touched, so a bad document
 * or replica default produces no output at all.
 */

import type { Readable, Writable } from 'stream';
import { composeStream } from '../compose/index.js';
import {
  loadConfigText,
  readReplicaDefault,
  resolveConfig,
  validateResolvedConfig,
  type ConfigSourceOptions,
  type ResolvedConfig,
} from '../config/index.js';
import { ENV_VARS } from '../constants.js';
import { LogLevel, logger } from '../logger.js';

export interface TransformOptions extends ConfigSourceOptions {
  input: Readable;
  output: Writable;
  template?: string;
}

/**
 * Run one transform. Resolves with the config that was rendered.
 */
export async function runTransform(options: TransformOptions): Promise<ResolvedConfig> {
  const replicaDefault = readReplicaDefault(options);
  const text = loadConfigText(options);
  const config = resolveConfig(text, replicaDefault, options.replicasEnv ?? ENV_VARS.REPLICAS);

  if (logger.isLevelEnabled(LogLevel.VERBOSE)) {
    for (const warning of validateResolvedConfig(config)) {
      logger.warn(warning);
    }
  }

  await composeStream({
    input: options.input,
    output: options.output,
    config,
    template: options.template,
  });
  return config;
}
