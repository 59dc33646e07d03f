// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads the raw configuration document and replica default from the
 * environment, or the document from a file named on the command line.
 */

import * as fs from 'fs';
import { ENV_VARS } from '../constants.js';
import { ConfigSourceError } from '../errors.js';
import { logger } from '../logger.js';
import type { ConfigSourceOptions } from './types.js';

/**
 * Load the configuration document text.
 * An unset variable yields an empty string, which the parser rejects.
 */
export function loadConfigText(options: ConfigSourceOptions): string {
  if (options.configFile) {
    try {
      const content = fs.readFileSync(options.configFile, 'utf-8');
      logger.debug(`Read configuration from ${options.configFile}`);
      return content;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigSourceError(
        `Failed to read ${options.configFile}: ${reason}`,
        options.configFile,
        { cause: error }
      );
    }
  }

  const variable = options.configEnv ?? ENV_VARS.API_CONFIG;
  const content = options.env[variable];
  if (content === undefined) {
    logger.debug(`${variable} is not set`);
    return '';
  }
  logger.debug(`Read configuration from $${variable}`);
  return content;
}

/**
 * Read the raw replica default, if any.
 */
export function readReplicaDefault(options: ConfigSourceOptions): string | undefined {
  return options.env[options.replicasEnv ?? ENV_VARS.REPLICAS];
}
