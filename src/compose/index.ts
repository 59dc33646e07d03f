// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Compose Module
 *
 * - template.ts - Static CockroachDB manifest template
 * - renderer.ts - Placeholder substitution
 * - composer.ts - Upstream passthrough, separator and manifest emission
 */

export { MANIFEST_TEMPLATE } from './template.js';
export { renderTemplate, buildTemplateValues, renderManifests } from './renderer.js';
export type { TemplateValues } from './renderer.js';
export { DOCUMENT_SEPARATOR, copyUpstream, composeStream } from './composer.js';
export type { ComposeOptions } from './composer.js';
