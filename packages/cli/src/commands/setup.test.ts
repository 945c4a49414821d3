/**
 * Setup Command Tests
 *
 * The wizard runs end to end against in-process fakes.
 */

import { DEFAULT_CONFIG } from '@git-onboard/core';
import { FakeExecutor, InMemoryConfigStore, ScriptedPrompter } from '@git-onboard/core/testing';
import { runSetup } from './setup.js';
import type { SetupContext } from './setup.js';

const GIT_VERSION = 'git version 2.43.0';

const probe = (present: string[]) => async (filePath: string) => present.includes(filePath);

/** Executor where git appears once `apt-get install` ran through sudo */
function debianExecutor(installExitCode = 0): FakeExecutor {
  let installed = false;
  return new FakeExecutor()
    .on('git', () => (installed ? { stdout: `${GIT_VERSION}\n` } : { code: 127 }))
    .on('sudo', (args) => {
      if (args[0] === 'apt-get' && args[1] === 'install') {
        if (installExitCode !== 0) return { code: installExitCode };
        installed = true;
      }
      return {};
    });
}

function createContext(overrides: Partial<SetupContext> = {}): SetupContext {
  return {
    executor: debianExecutor(),
    prompter: new ScriptedPrompter(),
    store: new InMemoryConfigStore(),
    config: DEFAULT_CONFIG,
    env: { OSTYPE: 'linux-gnu' },
    platform: 'linux',
    homeDir: '/home/ada',
    fileExists: probe(['/etc/debian_version']),
    elevated: false,
    ...overrides,
  };
}

describe('runSetup', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  const output = (): string[] => log.mock.calls.map((call: unknown[]) => String(call[0]));

  it('installs Git on Debian and stores the identity', async () => {
    const executor = debianExecutor();
    const store = new InMemoryConfigStore();
    const prompter = new ScriptedPrompter(['Ada Lovelace', 'ada@example.com', false, false, false, false, false]);

    const code = await runSetup(createContext({ executor, store, prompter }));

    expect(code).toBe(0);
    expect(prompter.remaining()).toBe(0);
    expect(executor.commandLines()).toEqual([
      'git --version',
      'sudo apt-get update',
      'sudo apt-get install -y git',
      'git --version',
    ]);
    expect(store.values.get('user.name')).toBe('Ada Lovelace');
    expect(store.values.get('user.email')).toBe('ada@example.com');
    expect(store.values.has('init.defaultBranch')).toBe(false);
    expect(store.values.has('core.editor')).toBe(false);
    expect([...store.values.keys()].filter((key) => key.startsWith('url.'))).toEqual([]);
    expect(output()).toContainEqual(expect.stringContaining('user.name=Ada Lovelace'));
  });

  it('asks about SSH and connectivity with the configured host', async () => {
    const prompter = new ScriptedPrompter(['Ada Lovelace', 'ada@example.com', false, false, false, false, false]);
    const config = { ...DEFAULT_CONFIG, hosting: { ...DEFAULT_CONFIG.hosting, host: 'git.example.com' } };

    await runSetup(createContext({ prompter, config }));

    expect(prompter.questions.slice(-2)).toEqual([
      'Set up an SSH key for git.example.com?',
      'Test the connection to git.example.com?',
    ]);
  });

  it('runs the connectivity checks when asked', async () => {
    const executor = new FakeExecutor().on('git', { stdout: `${GIT_VERSION}\n` }).on('ssh', { code: 1 });
    const prompter = new ScriptedPrompter([true, 'Ada Lovelace', 'ada@example.com', false, false, false, false, true]);

    const code = await runSetup(createContext({ executor, prompter }));

    expect(code).toBe(0);
    expect(executor.commandLines()).toEqual([
      'git --version',
      'ssh -T git@github.com',
      'git ls-remote https://github.com/octocat/Hello-World.git',
    ]);
  });

  it('exits with 1 on an unknown operating system', async () => {
    const executor = debianExecutor();

    const code = await runSetup(createContext({ executor, env: { OSTYPE: 'solaris2.11' } }));

    expect(code).toBe(1);
    expect(executor.calls).toEqual([]);
    expect(output()).toContainEqual(expect.stringContaining('Unsupported operating system (solaris2.11)'));
  });

  it('exits with 0 when the user keeps an existing installation', async () => {
    const executor = new FakeExecutor().on('git', { stdout: `${GIT_VERSION}\n` });
    const store = new InMemoryConfigStore();

    const code = await runSetup(createContext({ executor, store, prompter: new ScriptedPrompter([false]) }));

    expect(code).toBe(0);
    expect(store.values.size).toBe(0);
  });

  it('exits with 1 and prints instructions on an unsupported distribution', async () => {
    const code = await runSetup(createContext({ fileExists: probe([]) }));

    expect(code).toBe(1);
    expect(output()).toContainEqual(expect.stringContaining('Unsupported Linux distribution. Install Git manually:'));
  });

  it('prints a labeled error when the package manager fails', async () => {
    const store = new InMemoryConfigStore();

    const code = await runSetup(createContext({ executor: debianExecutor(100), store }));

    expect(code).toBe(1);
    expect(store.values.size).toBe(0);
    expect(output()).toContainEqual(
      expect.stringContaining('✖ [Installer] "sudo apt-get install -y git" failed with exit code 100')
    );
  });

  it('aborts when a required configuration write fails', async () => {
    const store = new InMemoryConfigStore();
    store.failingKeys.add('user.email');
    const prompter = new ScriptedPrompter(['Ada Lovelace', 'ada@example.com']);

    const code = await runSetup(createContext({ store, prompter }));

    expect(code).toBe(1);
    expect(output()).toContainEqual(
      expect.stringContaining('✖ [Configurator] Failed to set user.email: could not lock config file')
    );
  });
});
