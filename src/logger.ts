// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for diagnostic output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 *
 * stdout carries the composed manifest stream, so every line is written
 * to stderr.
 */

import chalk from 'chalk';
import type { ResolvedConfig } from './config/types.js';
import type { StreamPhase } from './errors.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only errors and warnings */
  NORMAL = 0,
  /** Verbose - advisory config warnings */
  VERBOSE = 1,
  /** Debug - resolved values and their sources */
  DEBUG = 2,
  /** Trace - byte counts per output phase */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Where the resolved replica count came from.
 */
export type ReplicaSource = 'document' | 'environment' | 'fallback';

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(`[Debug] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log the resolved configuration at DEBUG level.
   */
  resolvedConfig(config: ResolvedConfig, source: ReplicaSource): void {
    if (this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(
        `[Config] name="${config.name}", replicas=${config.replicas} (from ${source})`
      ));
    }
  }

  /**
   * Log bytes written for one output phase at TRACE level.
   */
  streamStats(phase: StreamPhase, bytes: number): void {
    if (this.level >= LogLevel.TRACE) {
      console.error(chalk.gray(`[Stream] ${phase}: ${bytes.toLocaleString()} bytes`));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
