/**
 * Puppeteer backend - drives an already-running Chrome over CDP
 *
 * Connects to the browser the automation-control process launched; it never
 * launches or kills Chrome itself. Contexts and pages are logical handles:
 * closing them does not terminate the browser process.
 */

import puppeteer, { Browser, BrowserContext, Page } from 'puppeteer-core';
import { v4 as uuidv4 } from 'uuid';
import { BrowserBackend } from './backend';
import { SupervisorError, toError } from '../errors';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_DEBUG_PORT,
  DEFAULT_PROTOCOL_TIMEOUT_MS,
  DEFAULT_PUPPETEER_CONNECT_TIMEOUT_MS,
} from '../config/defaults';

const log = createLogger('PuppeteerBackend');

export interface PuppeteerBackendOptions {
  /** Chrome remote debugging port (default: 9222) */
  port?: number;
  /** Explicit WebSocket endpoint; takes precedence over port */
  browserWSEndpoint?: string;
  connectTimeoutMs?: number;
}

interface PageEntry {
  page: Page;
  contextId: string;
}

export class PuppeteerBackend implements BrowserBackend {
  private browser: Browser | null = null;
  private pendingConnect: Promise<Browser> | null = null;
  private contexts: Map<string, BrowserContext> = new Map();
  private pages: Map<string, PageEntry> = new Map();
  private disconnectListeners: (() => void)[] = [];
  private port: number;
  private browserWSEndpoint?: string;
  private connectTimeoutMs: number;

  constructor(options: PuppeteerBackendOptions = {}) {
    this.port = options.port ?? DEFAULT_DEBUG_PORT;
    this.browserWSEndpoint = options.browserWSEndpoint;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_PUPPETEER_CONNECT_TIMEOUT_MS;
  }

  isConnected(): boolean {
    return this.browser !== null && this.browser.connected;
  }

  /**
   * Called when the CDP connection drops (the Disconnect trigger)
   */
  addDisconnectListener(listener: () => void): void {
    this.disconnectListeners.push(listener);
  }

  /**
   * Connect once; concurrent callers share the same attempt
   */
  async connect(): Promise<Browser> {
    if (this.browser && this.browser.connected) {
      return this.browser;
    }
    if (this.pendingConnect) {
      return this.pendingConnect;
    }

    this.pendingConnect = this.connectInternal();
    try {
      return await this.pendingConnect;
    } finally {
      this.pendingConnect = null;
    }
  }

  private async connectInternal(): Promise<Browser> {
    const target = this.browserWSEndpoint ?? `http://127.0.0.1:${this.port}`;
    const connectOptions = this.browserWSEndpoint
      ? { browserWSEndpoint: this.browserWSEndpoint }
      : { browserURL: target };

    // protocolTimeout only covers CDP messages, not the initial WebSocket handshake
    let timer: NodeJS.Timeout | undefined;
    let browser: Browser;
    try {
      browser = await Promise.race([
        puppeteer.connect({ ...connectOptions, defaultViewport: null, protocolTimeout: DEFAULT_PROTOCOL_TIMEOUT_MS }),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new SupervisorError('Timeout', `puppeteer.connect() timed out after ${this.connectTimeoutMs}ms (${target})`)),
            this.connectTimeoutMs,
          );
        }),
      ]);
    } catch (error) {
      if (error instanceof SupervisorError) {
        throw error;
      }
      throw new SupervisorError('Disconnect', `Cannot connect to browser at ${target}: ${toError(error).message}`, { target }, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    browser.on('disconnected', () => {
      log.warn('Browser disconnected');
      this.browser = null;
      this.contexts.clear();
      this.pages.clear();
      for (const listener of this.disconnectListeners) {
        listener();
      }
    });

    this.browser = browser;
    log.info(`Connected to browser at ${target}`);
    return browser;
  }

  async createContext(sessionId: string): Promise<string> {
    const browser = await this.connect();
    const context = await browser.createBrowserContext();
    const contextId = uuidv4();
    this.contexts.set(contextId, context);
    log.debug(`Created context ${contextId} for session ${sessionId}`);
    return contextId;
  }

  async openPage(contextId: string): Promise<string> {
    const context = this.requireContext(contextId);
    const page = await context.newPage();
    const pageId = uuidv4();
    this.pages.set(pageId, { page, contextId });
    return pageId;
  }

  async closePage(pageId: string): Promise<void> {
    const entry = this.pages.get(pageId);
    if (!entry) {
      return;
    }
    this.pages.delete(pageId);
    if (!entry.page.isClosed()) {
      await entry.page.close();
    }
  }

  async closeContext(contextId: string): Promise<void> {
    const context = this.contexts.get(contextId);
    for (const [pageId, entry] of this.pages) {
      if (entry.contextId === contextId) {
        this.pages.delete(pageId);
      }
    }
    if (!context) {
      return;
    }
    this.contexts.delete(contextId);
    await context.close();
  }

  /**
   * The live puppeteer Page behind a tab, for operations that drive it
   */
  getPage(pageId: string): Page | undefined {
    return this.pages.get(pageId)?.page;
  }

  /**
   * Drop the CDP connection. The browser process keeps running.
   */
  async disconnect(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.contexts.clear();
    this.pages.clear();
    if (browser) {
      browser.removeAllListeners('disconnected');
      await browser.disconnect();
    }
  }

  private requireContext(contextId: string): BrowserContext {
    const context = this.contexts.get(contextId);
    if (!context) {
      if (!this.isConnected()) {
        throw new SupervisorError('Disconnect', `Browser connection lost (context ${contextId})`, { contextId });
      }
      throw new SupervisorError('NotFound', `Browser context ${contextId} not found`, { contextId });
    }
    return context;
  }
}
