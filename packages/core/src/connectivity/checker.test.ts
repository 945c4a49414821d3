/**
 * Tests for ConnectivityChecker
 */

import { ConnectivityChecker } from './checker.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import type { HostingConfig } from '../config/types.js';
import { FakeExecutor } from '../testing/fakes.js';

describe('ConnectivityChecker', () => {
  const hosting: HostingConfig = {
    ...DEFAULT_CONFIG.hosting,
    host: 'git.example.com',
    testRepository: 'https://git.example.com/demo/hello.git',
  };

  it('reports the exit code of the SSH handshake', async () => {
    const executor = new FakeExecutor().on('ssh', { code: 1 });
    const checker = new ConnectivityChecker(executor, hosting);

    const result = await checker.checkSSH();

    expect(result).toEqual({ target: 'git@git.example.com', code: 1 });
    expect(executor.calls).toEqual([
      { command: 'ssh', args: ['-T', 'git@git.example.com'], options: { interactive: true } },
    ]);
  });

  it('lists the test repository over HTTPS', async () => {
    const executor = new FakeExecutor().on('git', { stdout: '0123abcd\tHEAD\n' });
    const checker = new ConnectivityChecker(executor, hosting);

    const result = await checker.checkHTTPS();

    expect(result).toEqual({ repository: 'https://git.example.com/demo/hello.git', reachable: true });
    expect(executor.commandLines()).toEqual(['git ls-remote https://git.example.com/demo/hello.git']);
  });

  it('reports an unreachable repository with the git error', async () => {
    const executor = new FakeExecutor().on('git', {
      code: 128,
      stderr: "fatal: unable to access 'https://git.example.com/demo/hello.git/': Could not resolve host\n",
    });
    const checker = new ConnectivityChecker(executor, hosting);

    const result = await checker.checkHTTPS();

    expect(result).toEqual({
      repository: 'https://git.example.com/demo/hello.git',
      reachable: false,
      error: "fatal: unable to access 'https://git.example.com/demo/hello.git/': Could not resolve host",
    });
  });

  it('leaves the error out when git prints nothing', async () => {
    const executor = new FakeExecutor().on('git', { code: 128 });
    const result = await new ConnectivityChecker(executor, hosting).checkHTTPS();

    expect(result).toEqual({ repository: hosting.testRepository, reachable: false, error: undefined });
  });

  it('runs the SSH check before the HTTPS check', async () => {
    const executor = new FakeExecutor().on('ssh', { code: 255 }).on('git', {});
    const report = await new ConnectivityChecker(executor, hosting).check();

    expect(report).toEqual({
      ssh: { target: 'git@git.example.com', code: 255 },
      https: { repository: hosting.testRepository, reachable: true },
    });
    expect(executor.calls.map((call) => call.command)).toEqual(['ssh', 'git']);
  });
});
