import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfigWithMeta, resolvePluralRules } from './loader.js';
import { normalizeConfig } from './normalizer.js';

describe('loadConfigWithMeta', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexiforge-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('falls back to defaults when no config file exists', async () => {
    const nested = path.join(tmpDir, 'a');
    await fs.mkdir(nested);
    const result = await loadConfigWithMeta(undefined, { cwd: nested });
    expect(result.configPath).toBeNull();
    expect(result.projectRoot).toBe(path.resolve(nested));
    expect(result.config.sourceLanguage).toBe('en');
  });

  it('finds the config file in a parent directory', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'lexiforge.config.json'),
      JSON.stringify({ sourceLanguage: 'fr', merge: { strategy: 'first' } })
    );
    const nested = path.join(tmpDir, 'deep', 'er');
    await fs.mkdir(nested, { recursive: true });

    const result = await loadConfigWithMeta(undefined, { cwd: nested });

    expect(result.configPath).toBe(path.join(tmpDir, 'lexiforge.config.json'));
    expect(result.projectRoot).toBe(tmpDir);
    expect(result.config.sourceLanguage).toBe('fr');
    expect(result.config.merge.strategy).toBe('first');
  });

  it('throws when an explicit config path is missing', async () => {
    await expect(loadConfigWithMeta('missing.json', { cwd: tmpDir })).rejects.toThrow(/Config file not found/);
  });

  it('throws on invalid JSON', async () => {
    await fs.writeFile(path.join(tmpDir, 'broken.json'), '{ "sourceLanguage": ');
    await expect(loadConfigWithMeta('broken.json', { cwd: tmpDir })).rejects.toThrow(/invalid JSON/);
  });

  it('throws on an invalid configuration', async () => {
    await fs.writeFile(path.join(tmpDir, 'bad.json'), JSON.stringify({ sourceLanguage: 'e n' }));
    await expect(loadConfigWithMeta('bad.json', { cwd: tmpDir })).rejects.toThrow(/Invalid lexiforge configuration/);
  });
});

describe('resolvePluralRules', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexiforge-rules-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('layers the rules file and inline rules over the shipped table', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'plurals.json'),
      JSON.stringify({ languages: { fr: ['one', 'many', 'other'] } })
    );
    const config = normalizeConfig({
      plurals: { rulesFile: 'plurals.json', rules: { xx: ['one', 'other'] } },
    });

    const table = await resolvePluralRules(config, tmpDir);

    expect(table.requiredCategories('fr')).toEqual(['one', 'many', 'other']);
    expect(table.requiredCategories('xx')).toEqual(['one', 'other']);
    expect(table.requiredCategories('pl')).toEqual(['one', 'few', 'many', 'other']);
  });
});
