import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrowserClient } from './browser-client.js';
import { Config } from '../types/index.js';
import { TransientFetchError } from '../utils/errors.js';
import { TEST_BASE_URL, testSelectors } from '../test-utils/listing-fixtures.js';

const { connect, launch, FakeTimeoutError } = vi.hoisted(() => ({
  connect: vi.fn(),
  launch: vi.fn(),
  FakeTimeoutError: class extends Error {},
}));

vi.mock('puppeteer-core', () => ({
  default: { connect, launch },
  TimeoutError: FakeTimeoutError,
}));

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const browserConfig: Config['browser'] = {
  wsEndpoint: 'ws://browser.test/devtools',
  executablePath: null,
  navigationTimeoutMs: 1000,
  fetchRetries: 3,
  retryBaseDelayMs: 0,
};

const sourceConfig: Config['source'] = {
  url: `${TEST_BASE_URL}/search`,
  baseUrl: TEST_BASE_URL,
  selectors: testSelectors,
  emptyResultsPattern: /no results/i,
  trimLabel: null,
  chargeTypeLabel: null,
};

/**
 * Browsers (connected or launched) whose page.goto fails for the first `failures` navigations
 */
function fakeBrowsers(failures: number) {
  let navigations = 0;
  const close = vi.fn(async () => undefined);
  const goto = vi.fn(async () => {
    navigations++;
    if (navigations <= failures) {
      throw new Error('net::ERR_CONNECTION_RESET');
    }
    return null;
  });
  const waitForSelector = vi.fn(async () => null);
  const page = { setViewport: vi.fn(async () => undefined), goto, waitForSelector };

  const browser = async () => ({ newPage: async () => page, close });
  connect.mockImplementation(browser);
  launch.mockImplementation(browser);
  return { close, goto, waitForSelector };
}

describe('BrowserClient.openListingSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should raise TransientFetchError once every attempt failed, closing each browser', async () => {
    const { close, goto } = fakeBrowsers(Infinity);
    const client = new BrowserClient(browserConfig, sourceConfig);

    const error = await client.openListingSource().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toHaveProperty('message', 'Failed to open listing source: net::ERR_CONNECTION_RESET');
    expect(connect).toHaveBeenCalledTimes(3);
    expect(connect).toHaveBeenCalledWith({ browserWSEndpoint: 'ws://browser.test/devtools' });
    expect(goto).toHaveBeenCalledTimes(3);
    expect(close).toHaveBeenCalledTimes(3);
  });

  it('should succeed on a later attempt and close the browser with the session', async () => {
    const { close, goto } = fakeBrowsers(1);
    const client = new BrowserClient(browserConfig, sourceConfig);

    const session = await client.openListingSource();

    expect(goto).toHaveBeenCalledTimes(2);
    expect(goto).toHaveBeenLastCalledWith(`${TEST_BASE_URL}/search`, {
      waitUntil: 'domcontentloaded',
      timeout: 1000,
    });
    expect(close).toHaveBeenCalledTimes(1);

    await session.close();
    expect(close).toHaveBeenCalledTimes(2);
  });

  it('should open an empty result page whose listing selector never appears', async () => {
    const { close, waitForSelector } = fakeBrowsers(0);
    waitForSelector.mockRejectedValueOnce(new FakeTimeoutError('Waiting for selector failed'));
    const client = new BrowserClient(browserConfig, sourceConfig);

    await client.openListingSource();

    expect(connect).toHaveBeenCalledTimes(1);
    expect(close).not.toHaveBeenCalled();
  });

  it('should launch the local browser when no endpoint is configured', async () => {
    const { close } = fakeBrowsers(0);
    const client = new BrowserClient(
      { ...browserConfig, wsEndpoint: null, executablePath: '/usr/bin/chromium', fetchRetries: 1 },
      sourceConfig
    );

    const session = await client.openListingSource();
    await session.close();

    expect(connect).not.toHaveBeenCalled();
    expect(launch).toHaveBeenCalledWith({
      executablePath: '/usr/bin/chromium',
      headless: true,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should refuse to open without a source URL', async () => {
    const client = new BrowserClient(browserConfig, { ...sourceConfig, url: '' });

    await expect(client.openListingSource()).rejects.toThrow('SOURCE_URL is not configured');
    expect(connect).not.toHaveBeenCalled();
  });
});
