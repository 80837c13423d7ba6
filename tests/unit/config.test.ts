import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { loadMenuSettings, resolveMenuSettings } from '../../src/core/config.js';
import { InvalidSettingsError } from '../../src/utils/errors.js';

describe('resolveMenuSettings', () => {
  it('should fill in defaults', () => {
    expect(resolveMenuSettings()).toEqual({
      locale: 'es',
      titleWidth: 22,
      titleHeight: 7,
      handleTitle: true,
      clearScreen: 'auto',
    });
  });

  it('should reject values of the wrong type', () => {
    expect(() => resolveMenuSettings({ titleWidth: -1 })).toThrow(InvalidSettingsError);
  });
});

describe('loadMenuSettings', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'ascii-menus-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return defaults with overrides when the file is missing', async () => {
    const settings = await loadMenuSettings(join(tempDir, 'missing.json'), { locale: 'en' });

    expect(settings.locale).toBe('en');
    expect(settings.titleWidth).toBe(22);
  });

  it('should merge the file under the overrides', async () => {
    const path = join(tempDir, 'menus.json');
    await writeFile(path, JSON.stringify({ locale: 'en', titleHeight: 3, clearScreen: 'off' }));

    const settings = await loadMenuSettings(path, { locale: 'es' });

    expect(settings).toEqual({
      locale: 'es',
      titleWidth: 22,
      titleHeight: 3,
      handleTitle: true,
      clearScreen: 'off',
    });
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(tempDir, 'menus.json');
    await writeFile(path, '{ locale: ');

    await expect(loadMenuSettings(path)).rejects.toThrow(/is not valid JSON/);
  });

  it('should name the offending field of an invalid file', async () => {
    const path = join(tempDir, 'menus.json');
    await writeFile(path, JSON.stringify({ clearScreen: 'sometimes' }));

    const error = await loadMenuSettings(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidSettingsError);
    expect(error instanceof Error && error.message).toContain('clearScreen:');
  });
});
