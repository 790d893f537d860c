import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isNavigateAction, NAVIGATE_ACTIONS, type KeyBindings } from '../tree/keymap.js';

const KeysSchema = z
  .record(z.array(z.string().min(1)))
  .superRefine((keys, ctx) => {
    for (const action of Object.keys(keys)) {
      if (!isNavigateAction(action)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown key action '${action}'`, path: [action] });
      }
    }
  });

export const ConfigSchema = z.object({
  file: z.string().default('outline.json'),
  interactive: z
    .object({
      colors: z
        .object({
          disable: z.boolean().optional(),
        })
        .optional(),
      chrome: z.number().int().min(0).max(10).optional(),
      keys: KeysSchema.optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.otl.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'otl', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string, startDir?: string): Config {
  const pathToLoad = configPath ?? findConfigPath(startDir) ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
}

export function resolveFile(config: Config, fileFlag?: string): string {
  return fileFlag ?? config.file;
}

/** Key overrides from the config, restricted to known actions. */
export function resolveKeyBindings(config: Config): Partial<KeyBindings> {
  const keys = config.interactive?.keys ?? {};
  const out: Partial<KeyBindings> = {};
  for (const action of NAVIGATE_ACTIONS) {
    const list = keys[action];
    if (list) out[action] = list;
  }
  return out;
}
