#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * cockroachdb-transformer
 *
 * Reads upstream resources on stdin, writes them to stdout followed by
 * the CockroachDB Services, PodDisruptionBudget and StatefulSet generated
 * from $API_CONFIG.
 */

import { program } from 'commander';
import { runTransform } from './cli/run.js';
import { ENV_VARS } from './constants.js';
import { describeError } from './errors.js';
import { logger, parseLogLevel } from './logger.js';
import { VERSION } from './version.js';

type CliOptions = {
  configEnv: string;
  replicasEnv: string;
  configFile?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
};

program
  .name('cockroachdb-transformer')
  .description('Append CockroachDB resources to a stream of YAML resources')
  .version(VERSION)
  .option('--config-env <name>', 'Environment variable holding the configuration document', ENV_VARS.API_CONFIG)
  .option('--replicas-env <name>', 'Environment variable holding the default replica count', ENV_VARS.REPLICAS)
  .option('-f, --config-file <path>', 'Read the configuration document from a file instead')
  .option('--verbose', 'Show configuration warnings')
  .option('--debug', 'Show resolved values and stack traces')
  .option('--trace', 'Show bytes written per output phase')
  .parse();

const options = program.opts<CliOptions>();
logger.setLevel(parseLogLevel(options));

async function main(): Promise<void> {
  await runTransform({
    env: process.env,
    configEnv: options.configEnv,
    replicasEnv: options.replicasEnv,
    configFile: options.configFile,
    input: process.stdin,
    output: process.stdout,
  });
}

main().catch((error: unknown) => {
  logger.error(describeError(error), error instanceof Error ? error : undefined);
  process.exit(1);
});
