import { StaticHtmlSession } from '../static-session.js';
import type { Fetcher } from '../types.js';

/**
 * Session serving fixed HTML per URL; records every URL loaded
 */
export function pageSession(pages: Record<string, string>): {
  session: StaticHtmlSession;
  visited: string[];
} {
  const visited: string[] = [];
  const session = new StaticHtmlSession(async (url) => {
    visited.push(url);
    const html = pages[url];
    if (html === undefined) {
      throw new Error(`No page for ${url}`);
    }
    return html;
  });
  return { session, visited };
}

export class RecordingFetcher implements Fetcher {
  readonly calls: Array<{ url: string; filename: string }> = [];

  constructor(private readonly succeed = true) {}

  async fetch(url: string, filename: string): Promise<string | null> {
    this.calls.push({ url, filename });
    return this.succeed ? `/out/${filename}` : null;
  }
}
