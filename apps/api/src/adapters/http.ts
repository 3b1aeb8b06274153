import { AdapterError, statusToErrorKind } from '../errors.js';

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'
];

export interface FetchHtmlOptions {
  signal: AbortSignal;
  headers?: Record<string, string>;
}

export interface HtmlPage {
  status: number;
  html: string;
  finalUrl: string;
}

function pickUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/**
 * GET an HTML page. Non-2xx responses become AdapterErrors classified by
 * status; network and abort errors propagate for the scheduler to classify.
 */
export async function fetchHtml(url: string, opts: FetchHtmlOptions): Promise<HtmlPage> {
  const response = await fetch(url, {
    signal: opts.signal,
    headers: {
      'User-Agent': pickUserAgent(),
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'pt-BR,pt;q=0.9,en-US;q=0.8,en;q=0.7',
      ...opts.headers
    },
    redirect: 'follow'
  });

  if (!response.ok) {
    const host = new URL(url).hostname;
    const detail = response.status === 403 ? `blocked by ${host} (403)` : `${host} responded ${response.status}`;
    throw new AdapterError(statusToErrorKind(response.status), detail, { status: response.status });
  }

  return {
    status: response.status,
    html: await response.text(),
    finalUrl: response.url || url
  };
}
