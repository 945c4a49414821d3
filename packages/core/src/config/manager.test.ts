/**
 * Tests for ConfigManager
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { ConfigManager } from './manager.js';
import { DEFAULT_CONFIG, SSHKeyType } from './types.js';
import { SetupError, SetupErrorCode } from '../utils/errors.js';
import { LogLevel } from '../utils/logger.js';

describe('ConfigManager', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-onboard-config-'));
    configPath = path.join(tmpDir, 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', async () => {
    const config = await new ConfigManager(configPath).load();
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges a partial file over the defaults', async () => {
    await fs.writeFile(
      configPath,
      ['hosting:', '  host: gitlab.example.com', 'sshKey:', '  type: rsa', 'logging:', '  level: debug', ''].join('\n')
    );

    const config = await new ConfigManager(configPath).load();

    expect(config.hosting.host).toBe('gitlab.example.com');
    expect(config.hosting.sshUser).toBe('git');
    expect(config.sshKey).toEqual({ type: SSHKeyType.RSA, bits: 4096 });
    expect(config.logging).toEqual({ level: LogLevel.DEBUG, logToFile: true });
    expect(config.git).toEqual(DEFAULT_CONFIG.git);
  });

  it('treats an empty file as defaults', async () => {
    await fs.writeFile(configPath, '');
    expect(await new ConfigManager(configPath).load()).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an unknown key type', async () => {
    await fs.writeFile(configPath, 'sshKey:\n  type: dsa\n');

    const error = await new ConfigManager(configPath).load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SetupError);
    expect(error).toMatchObject({
      code: SetupErrorCode.CONFIG_INVALID,
      step: 'Config',
      context: { problems: ['sshKey.type must be one of ed25519, ecdsa, rsa'] },
    });
  });

  it('rejects a non-positive cache timeout', async () => {
    await fs.writeFile(configPath, 'git:\n  credentialCacheTimeout: 0\n');

    await expect(new ConfigManager(configPath).load()).rejects.toMatchObject({
      code: SetupErrorCode.CONFIG_INVALID,
      context: { problems: ['git.credentialCacheTimeout must be a positive integer'] },
    });
  });

  it('reports every invalid field at once', async () => {
    await fs.writeFile(configPath, ['hosting: 5', 'logging:', '  level: loud', '  logToFile: maybe', ''].join('\n'));

    await expect(new ConfigManager(configPath).load()).rejects.toMatchObject({
      message: `Invalid configuration in ${configPath}`,
      context: {
        problems: [
          'hosting must be a mapping',
          'logging.level must be one of error, warn, info, debug',
          'logging.logToFile must be true or false',
        ],
      },
    });
  });

  it('rejects a file that is not a mapping', async () => {
    await fs.writeFile(configPath, '- one\n- two\n');

    await expect(new ConfigManager(configPath).load()).rejects.toMatchObject({
      code: SetupErrorCode.CONFIG_INVALID,
      message: `${configPath} must contain a mapping at the top level`,
    });
  });

  it('saves into a new directory and loads the same values back', async () => {
    const nestedPath = path.join(tmpDir, 'nested', 'config.yaml');
    const manager = new ConfigManager(nestedPath);
    const custom = { ...DEFAULT_CONFIG, git: { defaultBranch: 'trunk', credentialCacheTimeout: 900 } };

    await manager.save(custom);

    expect(await new ConfigManager(nestedPath).load()).toEqual(custom);
  });

  it('refuses to save before anything was loaded', async () => {
    await expect(new ConfigManager(configPath).save()).rejects.toThrow('No configuration to save');
  });

  it('exposes the loaded configuration', async () => {
    const manager = new ConfigManager(configPath);
    expect(() => manager.getConfig()).toThrow('Configuration not loaded');
    await manager.load();
    expect(manager.getConfig().hosting.host).toBe('github.com');
  });
});
