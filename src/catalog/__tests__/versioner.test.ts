import { describe, it, expect } from 'vitest';
import {
    bumpPatch,
    detectChange,
    digest,
    formatVersion,
    parseVersion,
    serializeCatalog,
    withVersion,
} from '../versioner.js';
import { VersionFormatError } from '../errors.js';
import type { Catalog } from '../types.js';

const catalog = (version?: string): Catalog => ({
    name: 'market',
    owner: { name: 'Owner' },
    ...(version === undefined ? {} : { version }),
    plugins: [{ name: 'alpha', source: './plugins/alpha' }],
});

describe('serializeCatalog / digest', () => {
    it('uses two-space indentation and a trailing newline', () => {
        const text = serializeCatalog({ name: 'm', owner: {}, plugins: [] });

        expect(text).toBe('{\n  "name": "m",\n  "owner": {},\n  "plugins": []\n}\n');
    });

    it('computes a SHA-256 hex digest', () => {
        expect(digest('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
});

describe('parseVersion', () => {
    it('parses three decimal components', () => {
        expect(parseVersion('2.3.7')).toEqual({ major: 2, minor: 3, patch: 7 });
    });

    it('defaults a missing version to 1.0.0', () => {
        expect(parseVersion(undefined)).toEqual({ major: 1, minor: 0, patch: 0 });
        expect(parseVersion(null)).toEqual({ major: 1, minor: 0, patch: 0 });
    });

    it.each(['1.2', '1.2.3.4', '1.2.x', '1.2.3-beta', 'v1.2.3', '', '1..3'])('rejects %j', (value) => {
        expect(() => parseVersion(value)).toThrow(VersionFormatError);
    });

    it('rejects non-string versions', () => {
        expect(() => parseVersion(3)).toThrow('Invalid catalog version 3: expected a string');
    });

    it('rejects components beyond the safe integer range', () => {
        expect(() => parseVersion('1.0.99999999999999999999')).toThrow(
            'Invalid catalog version "1.0.99999999999999999999": component exceeds the safe integer range'
        );
    });
});

describe('bumpPatch', () => {
    it('increments only the patch component', () => {
        expect(formatVersion(bumpPatch(parseVersion('2.3.7')))).toBe('2.3.8');
        expect(formatVersion(bumpPatch(parseVersion('0.9.9')))).toBe('0.9.10');
    });

    it('refuses to overflow', () => {
        const version = { major: 1, minor: 0, patch: Number.MAX_SAFE_INTEGER };

        expect(() => bumpPatch(version)).toThrow(VersionFormatError);
    });
});

describe('withVersion', () => {
    it('keeps an existing version key in place', () => {
        const input: Catalog = { version: '1.0.0', name: 'm', owner: {}, plugins: [] };

        expect(Object.keys(withVersion(input, '1.0.1'))).toEqual(['version', 'name', 'owner', 'plugins']);
    });

    it('appends a new version key just before plugins', () => {
        expect(Object.keys(withVersion(catalog(), '1.0.1'))).toEqual(['name', 'owner', 'version', 'plugins']);
    });
});

describe('detectChange', () => {
    it('reports no change when the serialization matches the file on disk', () => {
        const current = catalog('2.3.7');
        const decision = detectChange(serializeCatalog(current), current);

        expect(decision).toEqual({ changed: false, version: '2.3.7', content: serializeCatalog(current) });
    });

    it('bumps the patch version when content differs', () => {
        const previous = serializeCatalog({ ...catalog('2.3.7'), plugins: [] });
        const decision = detectChange(previous, catalog('2.3.7'));

        expect(decision.changed).toBe(true);
        expect(decision).toMatchObject({ previousVersion: '2.3.7', version: '2.3.8' });
        expect(decision.content).toBe(serializeCatalog(catalog('2.3.8')));
    });

    it('treats a whitespace-only difference as a change', () => {
        const current = catalog('1.4.0');
        const reformatted = JSON.stringify(current, null, 4) + '\n';

        expect(detectChange(reformatted, current)).toMatchObject({ changed: true, version: '1.4.1' });
    });

    it('starts from 1.0.0 when the catalog has no version', () => {
        const decision = detectChange('{}', catalog());

        expect(decision).toMatchObject({ changed: true, version: '1.0.1' });
        expect(decision.changed && decision.previousVersion).toBeUndefined();
        expect(decision.content).toBe(serializeCatalog(catalog('1.0.1')));
    });

    it('does not validate the version when nothing changed', () => {
        const current: Catalog = { name: 'm', owner: {}, version: 'not-semver', plugins: [] };

        expect(detectChange(serializeCatalog(current), current).changed).toBe(false);
    });

    it('throws VersionFormatError when a change meets a malformed version', () => {
        const current: Catalog = { name: 'm', owner: {}, version: 'not-semver', plugins: [] };

        expect(() => detectChange('{}', current)).toThrow(VersionFormatError);
    });
});
