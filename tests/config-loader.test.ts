import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigSchema,
  findConfigPath,
  getGlobalConfigPath,
  loadConfig,
  resolveFile,
  resolveKeyBindings,
} from '../src/config/loader.js';

let tempDir: string;
let originalHome: string | undefined;

beforeEach(() => {
  originalHome = process.env.HOME;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'otl-config-'));
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.env.HOME = originalHome;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeJson(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value), 'utf-8');
}

describe('config loader precedence', () => {
  it('uses defaults when no config exists', () => {
    const project = path.join(tempDir, 'project');
    fs.mkdirSync(project);
    const config = loadConfig(undefined, project);
    expect(config.file).toBe('outline.json');
    expect(config.interactive).toBeUndefined();
  });

  it('falls back to the global config', () => {
    const project = path.join(tempDir, 'project');
    fs.mkdirSync(project);
    writeJson(getGlobalConfigPath(), { file: 'global.json' });

    expect(getGlobalConfigPath()).toBe(path.join(tempDir, '.config', 'otl', 'config.json'));
    expect(loadConfig(undefined, project).file).toBe('global.json');
  });

  it('prefers the nearest project config, searching upwards', () => {
    const nested = path.join(tempDir, 'project', 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    writeJson(getGlobalConfigPath(), { file: 'global.json' });
    writeJson(path.join(tempDir, 'project', '.otl.json'), { file: 'local.json' });

    expect(findConfigPath(nested)).toBe(path.join(tempDir, 'project', '.otl.json'));
    expect(loadConfig(undefined, nested).file).toBe('local.json');
  });

  it('reads an explicit path', () => {
    const file = path.join(tempDir, 'custom.json');
    writeJson(file, { interactive: { chrome: 2, colors: { disable: true } } });
    const config = loadConfig(file);
    expect(config.interactive?.chrome).toBe(2);
    expect(config.interactive?.colors?.disable).toBe(true);
  });
});

describe('config validation', () => {
  it('reports invalid JSON with the file path', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ file:', 'utf-8');
    expect(() => loadConfig(file)).toThrow(`Invalid JSON in config file: ${file}`);
  });

  it('rejects key bindings for unknown actions', () => {
    expect(() => ConfigSchema.parse({ interactive: { keys: { fly: ['f'] } } })).toThrow(/Unknown key action 'fly'/);
  });

  it('rejects a chrome height out of range', () => {
    expect(ConfigSchema.safeParse({ interactive: { chrome: 20 } }).success).toBe(false);
  });
});

describe('config resolution', () => {
  it('lets a flag win over the configured file', () => {
    const config = ConfigSchema.parse({ file: 'todo.json' });
    expect(resolveFile(config)).toBe('todo.json');
    expect(resolveFile(config, 'other.json')).toBe('other.json');
  });

  it('passes key overrides through', () => {
    const config = ConfigSchema.parse({ interactive: { keys: { moveDown: ['n'], remove: ['d', 'DELETE'] } } });
    expect(resolveKeyBindings(config)).toEqual({ moveDown: ['n'], remove: ['d', 'DELETE'] });
    expect(resolveKeyBindings(ConfigSchema.parse({}))).toEqual({});
  });
});
