import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import fetch from 'node-fetch';
import { IPageSession, IPageSessionFactory, PageElement } from '../../core/interfaces/IPageSession.js';
import { SessionClosedError } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { pollUntil } from '../../utils/timing.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface FetchedPage {
  url: string; // final URL after redirects
  status: number;
  body: string;
}

export type HtmlFetcher = (url: string) => Promise<FetchedPage>;

export interface HttpSessionOptions {
  userAgent: string;
  requestTimeoutMs: number;
  pollIntervalMs?: number;
}

/**
 * Fetcher backed by node-fetch. The request timeout covers the body as well as the
 * headers; when it fires the request is aborted.
 */
export function createNodeFetcher(options: HttpSessionOptions): HtmlFetcher {
  return async (url: string) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.requestTimeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      return {
        url: response.url || url,
        status: response.status,
        body: await response.text(),
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`GET ${url} timed out after ${options.requestTimeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Page session over plain HTTP: documents are fetched and queried with cheerio.
 * Anchors are followed on click; scripted controls report that nothing happened.
 */
export class HttpPageSession implements IPageSession {
  private $: cheerio.CheerioAPI | null = null;
  private url: string | null = null;
  private nodes: AnyNode[] = [];
  private closed = false;

  constructor(
    private fetcher: HtmlFetcher,
    private logger: Logger = silentLogger,
    private pollIntervalMs = 250
  ) {}

  async navigate(url: string): Promise<void> {
    this.ensureOpen();
    const page = await this.fetcher(url);
    if (page.status >= 400) {
      throw new Error(`HTTP ${page.status} for ${url}`);
    }

    // Closed while the request was in flight
    this.ensureOpen();
    this.$ = cheerio.load(page.body);
    this.url = page.url;
    this.nodes = [];
    this.logger.debug(`Loaded ${page.url} (${page.body.length} bytes)`);
  }

  currentUrl(): string | null {
    return this.url;
  }

  async title(): Promise<string> {
    const $ = this.document();
    return collapse($('title').first().text());
  }

  async findFirst(selectors: readonly string[], scope?: PageElement): Promise<PageElement | null> {
    for (const selector of selectors) {
      const matches = this.select(selector, scope);
      if (matches.length > 0) {
        return this.register(matches[0]);
      }
    }
    return null;
  }

  async findAll(selectors: readonly string[], scope?: PageElement): Promise<PageElement[]> {
    for (const selector of selectors) {
      const matches = this.select(selector, scope);
      if (matches.length > 0) {
        return matches.map((node) => this.register(node));
      }
    }
    return [];
  }

  async attribute(element: PageElement, name: string): Promise<string | null> {
    const $ = this.document();
    const value = $(this.nodeOf(element)).attr(name);
    if (value === undefined) {
      return null;
    }

    if ((name === 'href' || name === 'src') && this.url) {
      try {
        return new URL(value, this.url).toString();
      } catch (error) {
        this.logger.debug(`Keeping unresolvable ${name} "${value}": ${String(error)}`);
        return value;
      }
    }
    return value;
  }

  async click(element: PageElement): Promise<boolean> {
    if (element.tagName !== 'a') {
      return false;
    }

    const href = await this.attribute(element, 'href');
    if (!href || !/^https?:/i.test(href)) {
      return false;
    }

    await this.navigate(href);
    return true;
  }

  async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
    this.ensureOpen();
    return pollUntil(predicate, timeoutMs, this.pollIntervalMs);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.$ = null;
    this.nodes = [];
    this.logger.debug(`Session closed${this.url ? ` at ${this.url}` : ''}`);
  }

  isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new SessionClosedError();
    }
  }

  private document(): cheerio.CheerioAPI {
    this.ensureOpen();
    if (!this.$) {
      throw new Error('No page loaded; call navigate() first');
    }
    return this.$;
  }

  private select(selector: string, scope?: PageElement): AnyNode[] {
    const $ = this.document();
    try {
      return scope ? $(this.nodeOf(scope)).find(selector).toArray() : $(selector).toArray();
    } catch (error) {
      this.logger.debug(`Skipping selector "${selector}": ${String(error)}`);
      return [];
    }
  }

  private register(node: AnyNode): PageElement {
    const $ = this.document();
    const wrapped = $(node);
    const handle = this.nodes.push(node) - 1;
    return {
      handle,
      tagName: (wrapped.prop('tagName') ?? '').toLowerCase(),
      text: collapse(wrapped.text()),
    };
  }

  private nodeOf(element: PageElement): AnyNode {
    const node = this.nodes[element.handle];
    if (!node) {
      throw new Error(`Stale element handle ${element.handle}`);
    }
    return node;
  }
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Opens one HttpPageSession per search task
 */
export class HttpPageSessionFactory implements IPageSessionFactory {
  private fetcher: HtmlFetcher;

  constructor(
    private options: HttpSessionOptions,
    private logger: Logger = silentLogger,
    fetcher?: HtmlFetcher
  ) {
    this.fetcher = fetcher ?? createNodeFetcher(options);
  }

  async open(): Promise<IPageSession> {
    return new HttpPageSession(this.fetcher, this.logger, this.options.pollIntervalMs);
  }
}
