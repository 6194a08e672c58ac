import { describe, it, expect, vi, afterEach } from 'vitest';
import { notify, webhookPayload } from './notify.js';
import { testSettings } from '../testing.js';

describe('notify', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('only logs without a webhook', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await notify(testSettings(), 'Alert cpu FIRING (value 95)');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the message to the webhook', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await notify(testSettings({ webhookUrl: 'http://hooks.test/notify' }), 'Load balancer recovered: 2 healthy backend(s)');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://hooks.test/notify');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify(webhookPayload('Load balancer recovered: 2 healthy backend(s)')));
  });

  it('swallows delivery failures after logging them', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('getaddrinfo ENOTFOUND hooks.test');
    }));
    const logged = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(notify(testSettings({ webhookUrl: 'http://hooks.test/notify' }), 'x')).resolves.toBeUndefined();
    expect(String(logged.mock.calls[1][0])).toMatch(/\[NOTIFY\] Failed to send webhook: getaddrinfo ENOTFOUND hooks\.test$/);
  });
});

describe('webhookPayload', () => {
  it('fills both Discord and Slack fields', () => {
    expect(webhookPayload('up')).toEqual({ content: '**Role Orchestrator**: up', text: '**Role Orchestrator**: up' });
  });
});
