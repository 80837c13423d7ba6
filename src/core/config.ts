import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { fileExists } from '../utils/fs.js';
import { InvalidSettingsError } from '../utils/errors.js';

export const DEFAULT_TITLE_WIDTH = 22;
export const DEFAULT_TITLE_HEIGHT = 7;

export const menuSettingsSchema = z.object({
  locale: z.enum(['es', 'en']).default('es'),
  titleWidth: z.number().int().nonnegative().default(DEFAULT_TITLE_WIDTH),
  titleHeight: z.number().int().nonnegative().default(DEFAULT_TITLE_HEIGHT),
  handleTitle: z.boolean().default(true),
  clearScreen: z.enum(['auto', 'ansi', 'newlines', 'off']).default('auto'),
});

export type MenuSettings = z.output<typeof menuSettingsSchema>;
export type MenuSettingsInput = z.input<typeof menuSettingsSchema>;
export type ClearScreenMode = MenuSettings['clearScreen'];

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function resolveMenuSettings(input: MenuSettingsInput = {}): MenuSettings {
  const parsed = menuSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError(`Invalid menu settings: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load settings from a JSON file. A missing file yields the defaults; a file
 * that is not valid JSON or fails validation raises InvalidSettingsError.
 */
export async function loadMenuSettings(
  path: string,
  overrides: MenuSettingsInput = {},
): Promise<MenuSettings> {
  if (!(await fileExists(path))) {
    return resolveMenuSettings(overrides);
  }

  const raw = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InvalidSettingsError(
      `Settings file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const fromFile = menuSettingsSchema.partial().safeParse(data);
  if (!fromFile.success) {
    throw new InvalidSettingsError(
      `Invalid menu settings in ${path}: ${describeIssues(fromFile.error)}`,
    );
  }
  return resolveMenuSettings({ ...fromFile.data, ...overrides });
}
