// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Manifest Renderer
 *
 * Substitutes resolved values into the manifest template. Only bare
 * `{{ key }}` placeholders are understood.
 */

import { MANIFEST_CONFIG } from '../constants.js';
import type { ResolvedConfig } from '../config/types.js';
import { RenderError } from '../errors.js';
import { MANIFEST_TEMPLATE } from './template.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export type TemplateValues = Readonly<Record<string, string | number>>;

/**
 * Replace every placeholder in one pass. Inserted values are not scanned
 * again, so a name containing braces is emitted as-is.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new RenderError(`template references unknown value "${key}"`);
    }
    return String(values[key]);
  });
}

/**
 * Values exposed to the manifest template.
 */
export function buildTemplateValues(config: ResolvedConfig): TemplateValues {
  return {
    name: config.name,
    replicas: config.replicas,
    appLabel: `${config.name}${MANIFEST_CONFIG.APP_LABEL_SUFFIX}`,
  };
}

function assertResolved(config: ResolvedConfig): void {
  if (typeof config.name !== 'string') {
    throw new RenderError('resolved config has no name');
  }
  if (!Number.isSafeInteger(config.replicas)) {
    throw new RenderError(`resolved config has invalid replicas: ${String(config.replicas)}`);
  }
}

/**
 * Render the CockroachDB resources for a resolved config.
 */
export function renderManifests(config: ResolvedConfig, template: string = MANIFEST_TEMPLATE): string {
  assertResolved(config);
  return renderTemplate(template, buildTemplateValues(config));
}
