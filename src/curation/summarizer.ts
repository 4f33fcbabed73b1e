import { collapseWhitespace } from '../shared/utils.js';

export interface SummaryInput {
  title: string | null;
  url: string;
  content: string;
}

/** Turns scraped text into newsletter copy. */
export interface Summarizer {
  /** Full newsletter blurb for an article. */
  summarize(input: SummaryInput): Promise<string>;
  /** One-sentence highlight for a snapshot. */
  highlight(input: SummaryInput): Promise<string>;
}

export const SUMMARY_MARKER = '🎯';
export const HIGHLIGHT_MARKER = '🚩';

export function excerpt(text: string, maxChars: number): string {
  const collapsed = collapseWhitespace(text);
  // counted in code points so a cut never splits a surrogate pair
  const chars = Array.from(collapsed);
  if (chars.length <= maxChars) return collapsed;
  return `${chars.slice(0, maxChars).join('').trimEnd()}…`;
}

export function firstSentence(text: string): string {
  const collapsed = collapseWhitespace(text);
  const match = /^.*?[.!?](?=\s|$)/.exec(collapsed);
  return match ? match[0] : collapsed;
}

/**
 * Placeholder summarizer. Output follows the newsletter layout (marker,
 * bold title, body, "more" link) with the body cut from the content itself.
 */
export class StubSummarizer implements Summarizer {
  constructor(private readonly excerptChars = 280) {}

  async summarize({ title, url, content }: SummaryInput): Promise<string> {
    const heading = title?.trim() || 'Untitled';
    return `${SUMMARY_MARKER} **${heading}**\n\n${excerpt(content, this.excerptChars)} ([more](${url}))`;
  }

  async highlight({ url, content }: SummaryInput): Promise<string> {
    return `${HIGHLIGHT_MARKER} ${excerpt(firstSentence(content), this.excerptChars)} ([more](${url}))`;
  }
}
