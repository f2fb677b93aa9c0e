import { type Browser, type BrowserType, chromium, firefox, webkit } from 'playwright';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

const browserTypes: Record<string, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

export class BrowserEngine {
  private browser: Browser | null = null;

  async launch(
    cfg: {
      browser?: string;
      headless?: boolean;
    } = {},
  ): Promise<void> {
    if (this.browser) {
      logger.warn('Browser already launched, closing existing instance');
      await this.close();
    }

    const browserName = cfg.browser ?? config.browser;
    const headless = cfg.headless ?? config.headless;

    const browserType = browserTypes[browserName];
    if (!browserType) {
      throw new Error(`Unsupported browser type: ${browserName}`);
    }

    logger.info({ browser: browserName, headless }, 'Launching browser');

    const args =
      browserName === 'chromium'
        ? ['--disable-web-security', '--disable-features=VizDisplayCompositor']
        : [];

    this.browser = await browserType.launch({ headless, args });

    this.browser.on('disconnected', () => {
      logger.warn('Browser disconnected unexpectedly');
      this.browser = null;
    });

    logger.info({ browser: browserName }, 'Browser launched successfully');
  }

  getBrowser(): Browser {
    if (!this.browser) {
      throw new Error('Browser not launched. Call launch() before accessing the browser.');
    }
    return this.browser;
  }

  isRunning(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async close(): Promise<void> {
    if (this.browser) {
      logger.info('Closing browser');
      try {
        await this.browser.close();
      } catch (err) {
        logger.error({ err }, 'Error closing browser');
      } finally {
        this.browser = null;
      }
    }
  }
}

export const browserEngine = new BrowserEngine();
