// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CockroachDB manifest template, loaded once from templates/cockroachdb.yaml.
 *
 * Placeholders: {{ name }}, {{ replicas }}, {{ appLabel }}
 */

import { readFileSync } from 'fs';

const MANIFEST_TEMPLATE_URL = new URL('../../templates/cockroachdb.yaml', import.meta.url);

export const MANIFEST_TEMPLATE: string = readFileSync(MANIFEST_TEMPLATE_URL, 'utf-8');
