import { describe, it, expect, vi } from 'vitest';
import { FetchError } from '../../src/errors.js';
import { BrowserSession } from '../../src/workers/browser-pool.js';
import { fakeBrowser } from '../helpers/fake-browser.js';

const options = { timeoutMs: 1000, readiness: { selector: '.match-header', settleMs: 250 } };

describe('BrowserSession', () => {
  it('should render a page after its readiness condition', async () => {
    const fake = fakeBrowser();
    const session = new BrowserSession(async () => fake.browser);

    const html = await session.render('https://www.vlr.gg/378660/x', options);

    expect(html).toContain('rendered');
    expect(fake.calls.urls).toEqual(['https://www.vlr.gg/378660/x']);
    expect(fake.calls.selectors).toEqual(['.match-header']);
    expect(fake.calls.settles).toEqual([250]);
    expect(fake.calls.contextsClosed).toBe(1);
  });

  it('should skip waits the readiness condition does not ask for', async () => {
    const fake = fakeBrowser();
    const session = new BrowserSession(async () => fake.browser);

    await session.render('https://www.vlr.gg/matches', { timeoutMs: 1000, readiness: {} });

    expect(fake.calls.selectors).toEqual([]);
    expect(fake.calls.settles).toEqual([]);
  });

  it('should reuse one browser across renders', async () => {
    const fake = fakeBrowser();
    const launcher = vi.fn(async () => fake.browser);
    const session = new BrowserSession(launcher);

    await Promise.all([session.render('https://www.vlr.gg/a', options), session.render('https://www.vlr.gg/b', options)]);
    await session.render('https://www.vlr.gg/c', options);

    expect(launcher).toHaveBeenCalledTimes(1);
    expect(session.launchCount).toBe(1);
  });

  it('should relaunch after the browser disconnects', async () => {
    const first = fakeBrowser();
    const second = fakeBrowser();
    const launcher = vi.fn().mockResolvedValueOnce(first.browser).mockResolvedValueOnce(second.browser);
    const session = new BrowserSession(launcher);

    await session.render('https://www.vlr.gg/a', options);
    first.disconnect();
    await session.render('https://www.vlr.gg/b', options);

    expect(session.launchCount).toBe(2);
    expect(second.calls.urls).toEqual(['https://www.vlr.gg/b']);
  });

  it('should close the context when rendering fails', async () => {
    const fake = fakeBrowser({
      goto: async () => {
        throw new Error('Target crashed');
      },
    });
    const session = new BrowserSession(async () => fake.browser);

    await expect(session.render('https://www.vlr.gg/a', options)).rejects.toThrow('Target crashed');
    expect(fake.calls.contextsClosed).toBe(1);
  });

  it('should reject an error response before waiting for readiness', async () => {
    const fake = fakeBrowser({ goto: async () => ({ status: () => 404 }) });
    const session = new BrowserSession(async () => fake.browser);

    const err = await session.render('https://www.vlr.gg/999999/missing', options).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: 'http_status', status: 404, transient: false });
    expect(fake.calls.selectors).toEqual([]);
    expect(fake.calls.contextsClosed).toBe(1);
  });

  it('should close the browser once', async () => {
    const fake = fakeBrowser();
    const session = new BrowserSession(async () => fake.browser);

    await session.render('https://www.vlr.gg/a', options);
    await session.close();
    await session.close();

    expect(fake.calls.browserClosed).toBe(1);
  });
});
