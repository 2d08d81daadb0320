import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { loadManifest, parseManifest, ManifestParseError } from './manifest.js';

describe('parseManifest', () => {
  it('parses issuers with their credentials', () => {
    const toml = `
[[issuers]]
issuer = "GitLab"

[[issuers.credentials]]
name = "cli PAT"
value = "XYZ"

[[issuers.credentials]]
name = "ci token"
value = "abc"
`;
    expect(parseManifest(toml)).toEqual({
      issuers: [
        {
          name: 'GitLab',
          credentials: [
            { name: 'cli PAT', value: 'XYZ' },
            { name: 'ci token', value: 'abc' },
          ],
        },
      ],
    });
  });

  it('keeps duplicate issuers in document order', () => {
    const toml = `
[[issuers]]
issuer = "GitHub"
credentials = [{ name = "a", value = "1" }]

[[issuers]]
issuer = "Cloudflare"
credentials = []

[[issuers]]
issuer = "GitHub"
credentials = [{ name = "b", value = "2" }]
`;
    const manifest = parseManifest(toml);
    expect(manifest.issuers.map((i) => i.name)).toEqual(['GitHub', 'Cloudflare', 'GitHub']);
    expect(manifest.issuers[1].credentials).toEqual([]);
    expect(manifest.issuers[2].credentials).toEqual([{ name: 'b', value: '2' }]);
  });

  it('accepts an empty issuer list', () => {
    expect(parseManifest('issuers = []')).toEqual({ issuers: [] });
  });

  it('accepts an empty credential value', () => {
    const toml = `
[[issuers]]
issuer = "npm"
credentials = [{ name = "publish", value = "" }]
`;
    expect(parseManifest(toml).issuers[0].credentials[0].value).toBe('');
  });

  it('throws on missing issuers', () => {
    expect(() => parseManifest('')).toThrow(ManifestParseError);
    expect(() => parseManifest('')).toThrow('Missing "issuers" in manifest');
  });

  it('throws when issuers is not an array', () => {
    expect(() => parseManifest('issuers = "GitLab"')).toThrow('"manifest.issuers" must be an array');
  });

  it('throws on missing credentials', () => {
    const toml = `
[[issuers]]
issuer = "GitLab"
`;
    expect(() => parseManifest(toml)).toThrow('Missing "credentials" in issuers[0]');
  });

  it('throws on a non-string value', () => {
    const toml = `
[[issuers]]
issuer = "GitLab"
credentials = [{ name = "cli PAT", value = 42 }]
`;
    expect(() => parseManifest(toml)).toThrow(
      '"issuers[0].credentials[0].value" must be a string, got number',
    );
  });

  it('throws on an empty credential name', () => {
    const toml = `
[[issuers]]
issuer = "GitLab"
credentials = [{ name = "", value = "x" }]
`;
    expect(() => parseManifest(toml)).toThrow('"issuers[0].credentials[0].name" must not be empty');
  });

  it('throws on an empty issuer name', () => {
    const toml = `
[[issuers]]
issuer = ""
credentials = []
`;
    expect(() => parseManifest(toml)).toThrow('"issuers[0].issuer" must not be empty');
  });

  it('wraps TOML syntax errors', () => {
    expect(() => parseManifest('issuers = [')).toThrow(ManifestParseError);
    expect(() => parseManifest('issuers = [')).toThrow(/^Invalid TOML/);
  });
});

describe('loadManifest', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'update-op-creds-manifest-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads and parses a manifest file', async () => {
    const file = path.join(tmpDir, 'creds.toml');
    await fs.writeFile(
      file,
      '[[issuers]]\nissuer = "Sentry"\ncredentials = [{ name = "auth token", value = "test-secret" }]\n',
    );

    expect(await loadManifest(file)).toEqual({
      issuers: [{ name: 'Sentry', credentials: [{ name: 'auth token', value: 'test-secret' }] }],
    });
  });

  it('reports a missing file with its path', async () => {
    const file = path.join(tmpDir, 'missing.toml');
    const err = await loadManifest(file).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ManifestParseError);
    expect((err as ManifestParseError).path).toBe(file);
    expect((err as ManifestParseError).message).toBe(`${file}: Manifest file does not exist`);
  });

  it('prefixes structural errors with the file path', async () => {
    const file = path.join(tmpDir, 'bad.toml');
    await fs.writeFile(file, 'title = "nothing here"\n');

    await expect(loadManifest(file)).rejects.toThrow(`${file}: Missing "issuers" in manifest`);
  });
});
