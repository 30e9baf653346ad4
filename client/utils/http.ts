import fetch from "node-fetch";
import { ApiRequestError } from "../errors.js";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

export type Query = Record<string, string | readonly string[] | undefined>;

export type GetJsonOptions = {
  query?: Query;
  headers?: Record<string, string>;
  /** Attempts after the first, for 429 and 5xx responses. */
  retries?: number;
  /** Pause after each successful response, to stay under the API's rate limit. */
  pauseMs?: number;
  /** Base wait between attempts when the response has no usable Retry-After. */
  backoffMs?: number;
};

export function withQuery(url: string, q?: Query): string {
  if (!q) return url;
  const pairs = Object.entries(q).flatMap(([k, v]): [string, string][] =>
    v === undefined ? [] : typeof v === "string" ? [[k, v]] : v.map((x): [string, string] => [k, x]),
  );
  return pairs.length ? `${url}?${new URLSearchParams(pairs).toString()}` : url;
}

/** Retry-After is either delay-seconds or an HTTP date. */
export function retryAfterMs(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  if (/^\d+$/.test(header.trim())) return Number(header.trim()) * 1000;
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export async function getJson(url: string, opts: GetJsonOptions = {}): Promise<unknown> {
  const retries = opts.retries ?? Number(process.env.HTTP_RETRIES ?? 3);
  const pauseMs = opts.pauseMs ?? Number(process.env.RATE_MS ?? 900);
  const backoffMs = opts.backoffMs ?? 500;
  const target = withQuery(url, opts.query);

  for (let i = 0; ; i++) {
    const res = await fetch(target, { headers: { Accept: "application/json", ...opts.headers } });
    if (res.ok) {
      const data: unknown = await res.json();
      await delay(pauseMs);
      return data;
    }
    const error = new ApiRequestError("GET", target, res.status, await res.text());
    if (!error.retryable || i >= retries) throw error;
    await delay(retryAfterMs(res.headers.get("retry-after")) ?? backoffMs * (i + 1));
  }
}
