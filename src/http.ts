import fetch from 'node-fetch';

export type HttpResponse = {
  status: number;
  body: string;
};

export type GetOptions = {
  timeoutMs: number;
  userAgent?: string;
  accept?: string;
};

/** GET a URL as text. Rejects on network faults and timeouts; HTTP errors resolve with their status. */
export type TextFetcher = (url: string, opts: GetOptions) => Promise<HttpResponse>;

export const fetchText: TextFetcher = async (url, opts) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'user-agent': opts.userAgent ?? 'Mozilla/5.0 (DealerDataScraper)',
        accept: opts.accept ?? '*/*',
      },
    });
    return { status: res.status, body: await res.text() };
  } finally {
    clearTimeout(timer);
  }
};
