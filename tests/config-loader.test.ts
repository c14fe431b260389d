import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

let originalCwd: string;
let tempDir: string;
let originalHome: string | undefined;
let originalUser: string | undefined;

beforeEach(() => {
  originalCwd = process.cwd();
  originalHome = process.env.HOME;
  originalUser = process.env.USER;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskreview-config-'));
  process.chdir(tempDir);
  process.env.HOME = tempDir;
  process.env.USER = 'tester';
});

afterEach(() => {
  process.chdir(originalCwd);
  process.env.HOME = originalHome;
  process.env.USER = originalUser;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('config loader precedence', () => {
  it('uses schema defaults when no config exists', async () => {
    vi.resetModules();
    const { loadConfig, resolveKeysPath, resolveReviewTag } = await import('../src/config/loader.js');
    const config = loadConfig();
    expect(config.reviewWindowHours).toBe(24);
    expect(config.listLimit).toBe(30);
    expect(config.defaultColor).toBe('green');
    expect(config.sort).toBe('urgency');
    expect(config.backend).toEqual({ command: 'task', args: ['rc.confirmation=off', 'rc.json.array=on'] });
    expect(resolveKeysPath(config)).toBe(path.join(tempDir, '.taskreview'));
    expect(resolveReviewTag(config)).toBe('r:tester');
  });

  it('falls back to global config when no local config is present', async () => {
    const globalConfigPath = path.join(tempDir, '.config', 'taskreview');
    fs.mkdirSync(globalConfigPath, { recursive: true });
    fs.writeFileSync(
      path.join(globalConfigPath, 'config.json'),
      JSON.stringify({ listLimit: 10, reviewTag: 'r:global' }),
      'utf-8'
    );

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    const config = loadConfig();
    expect(config.listLimit).toBe(10);
    expect(config.reviewTag).toBe('r:global');
  });

  it('prioritizes local project config over global config', async () => {
    const globalConfigPath = path.join(tempDir, '.config', 'taskreview');
    fs.mkdirSync(globalConfigPath, { recursive: true });
    fs.writeFileSync(path.join(globalConfigPath, 'config.json'), JSON.stringify({ listLimit: 10 }), 'utf-8');
    fs.writeFileSync(path.join(tempDir, '.taskreview.json'), JSON.stringify({ listLimit: 5 }), 'utf-8');

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    expect(loadConfig().listLimit).toBe(5);
  });

  it('lets flags override the keys file and review tag', async () => {
    fs.writeFileSync(
      path.join(tempDir, '.taskreview.json'),
      JSON.stringify({ keysFile: '/tmp/keys.json', reviewTag: 'r:config' }),
      'utf-8'
    );

    vi.resetModules();
    const { loadConfig, resolveKeysPath, resolveReviewTag } = await import('../src/config/loader.js');
    const config = loadConfig();
    expect(resolveKeysPath(config)).toBe('/tmp/keys.json');
    expect(resolveKeysPath(config, '/tmp/other.json')).toBe('/tmp/other.json');
    expect(resolveReviewTag(config, 'r:flag')).toBe('r:flag');
  });

  it('rejects invalid JSON and invalid values', async () => {
    const configPath = path.join(fs.realpathSync(tempDir), '.taskreview.json');
    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    const { ConfigError } = await import('../src/cli/errors.js');

    fs.writeFileSync(configPath, '{ oops', 'utf-8');
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow(`${configPath}: Invalid JSON in config file`);

    fs.writeFileSync(configPath, JSON.stringify({ listLimit: 0 }), 'utf-8');
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow(`${configPath}: Invalid config (listLimit: `);
  });
});
