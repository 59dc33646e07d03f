// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { parseApiConfig } from '../src/config/index.js';
import { ErrorCode, ParseError } from '../src/errors.js';
import { captureError } from './helpers/errors.js';

describe('parseApiConfig', () => {
  describe('recognized fields', () => {
    it('extracts metadata.name and spec.replicas', () => {
      const config = parseApiConfig('metadata:\n  name: mydb\nspec:\n  replicas: 3\n');
      expect(config).toEqual({ metadata: { name: 'mydb' }, spec: { replicas: 3 } });
    });

    it('ignores unknown fields at every level', () => {
      const text = [
        'apiVersion: v1',
        'kind: CockroachDB',
        'metadata:',
        '  name: mydb',
        '  labels:',
        '    tier: db',
        'spec:',
        '  replicas: 2',
        '  storage: 10Gi',
        'status: {}',
        '',
      ].join('\n');

      expect(parseApiConfig(text)).toEqual({ metadata: { name: 'mydb' }, spec: { replicas: 2 } });
    });

    it('leaves replicas absent when spec omits it', () => {
      expect(parseApiConfig('metadata:\n  name: mydb\n')).toEqual({ metadata: { name: 'mydb' } });
    });

    it('treats a null replicas value as absent', () => {
      expect(parseApiConfig('spec:\n  replicas: ~\n')).toEqual({ spec: {} });
    });

    it('keeps an explicit zero', () => {
      expect(parseApiConfig('spec:\n  replicas: 0\n').spec?.replicas).toBe(0);
    });

    it('keeps negative values', () => {
      expect(parseApiConfig('spec:\n  replicas: -2\n').spec?.replicas).toBe(-2);
    });

    it('copies the name without trimming or case changes', () => {
      expect(parseApiConfig("metadata:\n  name: '  My DB '\n").metadata?.name).toBe('  My DB ');
    });

    it.each(['42', '042', '1.0', '0x1F', '1e3', '.inf', '0o17', 'true'])(
      'keeps the unquoted name %s as written',
      (name) => {
        expect(parseApiConfig(`metadata:\n  name: ${name}\n`).metadata?.name).toBe(name);
      }
    );

    it('keeps a numeric name as written when followed by a comment', () => {
      expect(parseApiConfig('metadata:\n  name: 007 # agent\n').metadata?.name).toBe('007');
    });

    it('falls back to the decoded value for an explicitly tagged name', () => {
      expect(parseApiConfig('metadata:\n  name: !!int 042\n').metadata?.name).toBe('42');
    });

    it('reads only the first document of a stream', () => {
      const text = 'metadata:\n  name: first\n---\nmetadata:\n  name: second\n';
      expect(parseApiConfig(text).metadata?.name).toBe('first');
    });

    it('returns an empty config for a null document', () => {
      expect(parseApiConfig('~\n')).toEqual({});
    });

    it('returns an empty config for a bare document marker', () => {
      expect(parseApiConfig('---\n')).toEqual({});
    });
  });

  describe('failures', () => {
    it('rejects an empty document', () => {
      expect(() => parseApiConfig('')).toThrow(new ParseError('configuration document is empty'));
    });

    it('rejects a whitespace-only document', () => {
      expect(() => parseApiConfig('  \n\t\n')).toThrow('configuration document is empty');
    });

    it('rejects a comment-only document', () => {
      expect(() => parseApiConfig('# nothing\n')).toThrow(
        new ParseError('configuration document is empty')
      );
      expect(() => parseApiConfig('  # one\n\n# two\n')).toThrow('configuration document is empty');
    });

    it('rejects malformed YAML', () => {
      const caught = captureError(() => parseApiConfig('metadata: [unclosed\n'));
      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.code).toBe(ErrorCode.PARSE);
        expect(caught.message).toMatch(/^invalid configuration document: /);
        expect(caught.cause).toBeInstanceOf(Error);
      }
    });

    it('rejects duplicate keys', () => {
      expect(() => parseApiConfig('metadata:\n  name: a\nmetadata:\n  name: b\n')).toThrow(ParseError);
    });

    it('rejects a scalar root', () => {
      expect(() => parseApiConfig('just-a-string\n')).toThrow(
        'configuration document must be a mapping, got the string "just-a-string"'
      );
    });

    it('rejects a sequence root', () => {
      expect(() => parseApiConfig('- a\n- b\n')).toThrow(
        'configuration document must be a mapping, got a sequence'
      );
    });

    it('rejects a metadata section that is not a mapping', () => {
      expect(() => parseApiConfig('metadata: mydb\n')).toThrow(
        'metadata must be a mapping, got the string "mydb"'
      );
    });

    it('rejects a structured name', () => {
      expect(() => parseApiConfig('metadata:\n  name:\n    first: a\n')).toThrow(
        'metadata.name must be a string, got a mapping'
      );
    });

    it('rejects non-numeric replicas', () => {
      expect(() => parseApiConfig('spec:\n  replicas: three\n')).toThrow(
        'spec.replicas must be an integer, got the string "three"'
      );
    });

    it('rejects quoted replicas', () => {
      expect(() => parseApiConfig('spec:\n  replicas: "3"\n')).toThrow(ParseError);
    });

    it('rejects fractional replicas', () => {
      expect(() => parseApiConfig('spec:\n  replicas: 2.5\n')).toThrow(
        'spec.replicas must be an integer, got number 2.5'
      );
    });

    it('rejects replicas beyond the safe integer range', () => {
      expect(() => parseApiConfig('spec:\n  replicas: 9007199254740993\n')).toThrow(ParseError);
      expect(parseApiConfig('spec:\n  replicas: 9007199254740991\n').spec?.replicas).toBe(
        Number.MAX_SAFE_INTEGER
      );
    });
  });
});
