import { describe, it, expect, vi, afterEach } from 'vitest';
import { LocalRunner, SshRunner, createRunner } from './runner.js';
import { shellQuote, sshExec } from './ssh.js';
import { testSettings } from '../testing.js';

describe('shellQuote', () => {
  it('leaves plain words alone', () => {
    expect(shellQuote('nginx')).toBe('nginx');
    expect(shellQuote('/etc/nginx/sites-available/shop')).toBe('/etc/nginx/sites-available/shop');
  });

  it('quotes spaces and embedded quotes', () => {
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('sshExec', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects on an unreadable key without arming the connection timeout', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const remote = { host: '10.0.0.9', port: 22, user: 'deploy', keyPath: '/nonexistent/test-key' };

    await expect(sshExec(remote, 'systemctl is-active nginx', 60_000))
      .rejects.toThrow(/^SSH key \/nonexistent\/test-key: ENOENT/);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('LocalRunner', () => {
  it('reports a non-zero exit in the result', async () => {
    const result = await new LocalRunner().run(process.execPath, ['-e', 'process.stderr.write("nope"); process.exit(2)']);
    expect(result).toEqual({ stdout: '', stderr: 'nope', code: 2 });
  });

  it('captures trimmed stdout', async () => {
    const result = await new LocalRunner().run(process.execPath, ['-e', 'console.log("active")']);
    expect(result).toEqual({ stdout: 'active', stderr: '', code: 0 });
  });

  it('rejects when the command cannot run', async () => {
    await expect(new LocalRunner().run('definitely-not-a-command-xyz', [])).rejects.toThrow(
      /^definitely-not-a-command-xyz failed: /,
    );
  });
});

describe('createRunner', () => {
  it('runs locally unless a remote host is configured', () => {
    expect(createRunner(testSettings())).toBeInstanceOf(LocalRunner);

    const remote = createRunner(testSettings({
      remote: { host: '10.0.0.9', port: 22, user: 'deploy', keyPath: '/keys/test-key' },
    }));
    expect(remote).toBeInstanceOf(SshRunner);
    expect(remote.target).toBe('deploy@10.0.0.9');
  });
});
