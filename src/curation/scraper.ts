import { JSDOM } from 'jsdom';
import { UpstreamError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Fetches a page and returns its readable text. */
export interface WebScraper {
  fetchText(url: string): Promise<string>;
}

export interface ScraperOptions {
  timeoutMs: number;
  userAgent: string;
  minLineChars: number;
}

const NOISE_SELECTOR = 'script, style, noscript, header, footer, nav, aside, form, button';

function collectText(node: Node, out: string[]): void {
  if (node.nodeType === node.TEXT_NODE) {
    out.push(node.textContent ?? '');
    return;
  }
  node.childNodes.forEach((child) => collectText(child, out));
}

/**
 * Pull the main text out of an HTML page: chrome elements are removed, the
 * first <article>, else <main>, else <body> is read, and only lines longer
 * than `minLineChars` are kept.
 */
export function extractMainText(html: string, minLineChars = 25): string {
  const dom = new JSDOM(html);
  const { document } = dom.window;

  for (const el of Array.from(document.querySelectorAll(NOISE_SELECTOR))) {
    el.remove();
  }

  const root = document.querySelector('article') ?? document.querySelector('main') ?? document.body;

  const chunks: string[] = [];
  collectText(root, chunks);

  const lines: string[] = [];
  for (const chunk of chunks) {
    for (const line of chunk.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.length > minLineChars) lines.push(trimmed);
    }
  }

  dom.window.close();
  return lines.join('\n');
}

export class JsdomScraper implements WebScraper {
  constructor(private readonly options: ScraperOptions) {}

  async fetchText(url: string): Promise<string> {
    let html: string;
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new UpstreamError(`Web scraping failed: HTTP ${response.status}`, {
          url,
          status: response.status,
        });
      }

      html = await response.text();
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      throw new UpstreamError(`Web scraping failed: ${errorMessage(err)}`, { url });
    }

    const text = extractMainText(html, this.options.minLineChars);
    if (!text) {
      throw new UpstreamError('No content found at URL.', { url });
    }

    logger.debug({ url, chars: text.length }, 'Page scraped');
    return text;
  }
}
