import { chromium, type Browser, type BrowserContext } from "playwright-core";
import { emitAgentEvent } from "../pipeline/events.js";

export interface RenderOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RenderedPage {
  url: string;
  finalUrl: string;
  html: string;
}

/** Headless browse session: navigate to a URL and return the rendered HTML. */
export interface BrowserSession {
  render(url: string, options: RenderOptions): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface PlaywrightSessionOptions {
  executablePath?: string;
  userAgent?: string;
}

/**
 * One Chromium process shared by every invocation, launched on first use.
 * Each render gets its own browser context, so no cookies or storage leak
 * between pages.
 */
export class PlaywrightBrowserSession implements BrowserSession {
  private browser: Promise<Browser> | undefined;

  constructor(private readonly options: PlaywrightSessionOptions = {}) {}

  async render(url: string, options: RenderOptions): Promise<RenderedPage> {
    options.signal?.throwIfAborted();
    const browser = await this.launch();
    const context = await browser.newContext({ userAgent: this.options.userAgent });
    const onAbort = () => {
      void closeContext(context);
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const page = await context.newPage();
      await page.goto(url, { timeout: options.timeoutMs, waitUntil: "domcontentloaded" });
      const html = await page.content();
      return { url, finalUrl: page.url(), html };
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      await closeContext(context);
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = undefined;
    if (!pending) {
      return;
    }
    const browser = await pending;
    await browser.close();
    emitAgentEvent({
      level: "info",
      eventType: "browser.lifecycle",
      message: "Browser closed",
      phase: "end",
      step: "system",
    });
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      emitAgentEvent({
        level: "info",
        eventType: "browser.lifecycle",
        message: "Launching headless browser",
        phase: "start",
        step: "system",
      });
      const launching = chromium.launch({
        headless: true,
        executablePath: this.options.executablePath,
      });
      launching.catch(() => {
        if (this.browser === launching) {
          this.browser = undefined;
        }
      });
      this.browser = launching;
    }
    return this.browser;
  }
}

async function closeContext(context: BrowserContext): Promise<void> {
  try {
    await context.close();
  } catch (error) {
    emitAgentEvent({
      level: "debug",
      eventType: "browser.lifecycle",
      message: "Browser context close failed",
      errorMessage: String(error),
    });
  }
}
