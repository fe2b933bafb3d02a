import puppeteer, { Browser, Page, TimeoutError } from 'puppeteer-core';
import { Config } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TransientFetchError, errorMessage } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { ListingPage, ListingSession } from './listing-page.js';

/**
 * ListingPage backed by a live Puppeteer page
 */
export class PuppeteerListingPage implements ListingPage {
  constructor(
    private readonly page: Page,
    private readonly listingSelector: string,
    private readonly loadMoreSelector: string | null
  ) {}

  async readListings(): Promise<string[]> {
    return this.page.$$eval(this.listingSelector, nodes => nodes.map(node => node.outerHTML));
  }

  async grow(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });

    if (!this.loadMoreSelector) return;

    const button = await this.page.$(this.loadMoreSelector);
    if (!button) return;

    try {
      await button.click();
    } catch (error) {
      // Button detached or hidden between lookup and click; the next step retries
      logger.debug('Load-more click failed', { error: errorMessage(error) });
    } finally {
      await button.dispose();
    }
  }

  async waitForGrowth(count: number, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForFunction(
        (selector: string, previous: number) => document.querySelectorAll(selector).length > previous,
        { timeout: timeoutMs, polling: 250 },
        this.listingSelector,
        count
      );
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async bodyText(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? '');
  }
}

/**
 * Headless browser client for the listing source
 *
 * Connects to a remote browser when BROWSER_WS_ENDPOINT is set, otherwise
 * launches the local Chrome at CHROME_EXECUTABLE_PATH.
 */
export class BrowserClient {
  constructor(
    private readonly browserConfig: Config['browser'],
    private readonly sourceConfig: Config['source']
  ) {}

  private async connect(): Promise<Browser> {
    const { wsEndpoint, executablePath } = this.browserConfig;

    if (wsEndpoint) {
      logger.debug('Connecting to remote browser');
      return puppeteer.connect({ browserWSEndpoint: wsEndpoint });
    }

    if (executablePath) {
      logger.debug('Launching local browser', { executablePath });
      return puppeteer.launch({
        executablePath,
        headless: true,
        args: ['--no-sandbox', '--disable-dev-shm-usage'],
      });
    }

    throw new Error('No browser configured. Set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH');
  }

  /**
   * Open the listing source. Navigation is retried with exponential backoff;
   * exhausting the attempts raises TransientFetchError.
   */
  async openListingSource(url: string = this.sourceConfig.url): Promise<ListingSession> {
    if (!url) {
      throw new Error('SOURCE_URL is not configured');
    }

    const { navigationTimeoutMs, fetchRetries, retryBaseDelayMs } = this.browserConfig;
    const { selectors } = this.sourceConfig;

    return withRetry(
      async (attempt) => {
        let browser: Browser | null = null;

        try {
          browser = await this.connect();
          const page = await browser.newPage();
          await page.setViewport({ width: 1920, height: 1080 });

          logger.info('Opening listing source', { url, attempt });
          await page.goto(url, { waitUntil: 'domcontentloaded', timeout: navigationTimeoutMs });

          try {
            await page.waitForSelector(selectors.listing, { timeout: navigationTimeoutMs });
          } catch (waitError) {
            if (!(waitError instanceof TimeoutError)) throw waitError;
            // An empty result page has no listing nodes; the extractor decides
            logger.warn('Listing selector not found after navigation', { url, selector: selectors.listing });
          }

          const openBrowser = browser;
          return {
            page: new PuppeteerListingPage(page, selectors.listing, selectors.loadMore),
            close: async () => {
              await openBrowser.close();
              logger.debug('Browser session closed');
            },
          };
        } catch (error) {
          if (browser) {
            await browser.close().catch((closeError: unknown) => {
              logger.warn('Failed to close browser after navigation error', {
                error: errorMessage(closeError),
              });
            });
          }
          throw new TransientFetchError(`Failed to open listing source: ${errorMessage(error)}`, { cause: error });
        }
      },
      { attempts: fetchRetries, baseDelayMs: retryBaseDelayMs, label: 'Listing source navigation' }
    );
  }
}
