// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Integer parsing for the environment replica default, plus advisory
 * checks on the resolved values.
 */

import { InvalidDefaultError } from '../errors.js';
import type { ResolvedConfig } from './types.js';

/**
 * Optional sign followed by ASCII digits, nothing else.
 */
const DECIMAL_INTEGER = /^[+-]?[0-9]+$/;

/**
 * Parse a replica count taken from the environment.
 * Accepts the decimal forms a 64-bit integer parser would, but only within
 * the safe integer range; larger magnitudes are rejected, not rounded.
 * @param variable - Variable name, only used in the error message
 */
export function parseReplicaDefault(raw: string, variable?: string): number {
  if (!DECIMAL_INTEGER.test(raw)) {
    throw new InvalidDefaultError(raw, variable);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidDefaultError(raw, variable);
  }
  // Number('-0') is -0
  return value === 0 ? 0 : value;
}

/**
 * Validate resolved configuration.
 * Returns warning messages; none of them stop the transform.
 */
export function validateResolvedConfig(config: ResolvedConfig): string[] {
  const warnings: string[] = [];

  if (config.name === '') {
    warnings.push('metadata.name is empty; generated resources will have blank names');
  }

  if (config.replicas < 1) {
    warnings.push(`replicas is ${config.replicas}; the StatefulSet will not run any pods`);
  }

  return warnings;
}
