import { nanoid } from 'nanoid';
import type { Browser, BrowserContext, Page } from 'playwright';
import { config } from '../config.js';
import { type Logger, logger } from '../utils/logger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogListener = (line: string) => void;

export interface SessionCreateOptions {
  viewport?: { width: number; height: number };
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * One browser context and its page. The page is the single shared resource
 * every action runs against; nothing else may drive it while a scenario runs.
 */
export class Session {
  readonly id: string;
  readonly context: BrowserContext;
  readonly page: Page;
  private readonly sessionLogger: Logger;
  private readonly listeners = new Set<LogListener>();

  constructor(id: string, context: BrowserContext, page: Page) {
    this.id = id;
    this.context = context;
    this.page = page;
    this.sessionLogger = logger.child({ sessionId: id });
  }

  static async create(browser: Browser, options: SessionCreateOptions = {}): Promise<Session> {
    const id = nanoid();
    const viewport = options.viewport ?? {
      width: config.viewportWidth,
      height: config.viewportHeight,
    };

    const context = await browser.newContext({
      viewport,
      acceptDownloads: false,
    });

    const page = await context.newPage();

    logger.info({ sessionId: id, viewport }, 'Session created');

    return new Session(id, context, page);
  }

  /** Subscribe to execution-log lines. Returns the unsubscribe function. */
  onLog(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(level: LogLevel, message: string, fields: Record<string, unknown> = {}): void {
    this.sessionLogger[level](fields, message);

    if (level === 'debug') return;
    const prefix = level === 'info' ? '' : `${level.toUpperCase()}: `;
    const line = `[${formatTimestamp(new Date())}] ${prefix}${message}`;
    for (const listener of this.listeners) {
      listener(line);
    }
  }

  async close(): Promise<void> {
    logger.info({ sessionId: this.id }, 'Closing session');
    try {
      await this.context.close();
    } catch (err) {
      logger.error({ sessionId: this.id, err }, 'Error closing session context');
    }
  }
}
