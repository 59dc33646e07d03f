// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Transformer version.
 * Keep this in sync with package.json version.
 *
 * Versioning convention:
 * - MAJOR: Breaking changes to CLI flags, environment variables or emitted manifests
 * - MINOR: New features, non-breaking changes
 * - PATCH: Bug fixes, minor improvements
 */
export const VERSION = '0.1.0';
