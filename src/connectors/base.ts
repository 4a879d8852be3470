import { fetch, ProxyAgent, type Dispatcher } from "undici";
import { z } from "zod";
import { logger } from "../logger";
import {
  HttpStatusError,
  MalformedError,
  NotFoundError,
  PipelineError,
  RateLimitedError,
  TransientNetworkError,
} from "../errors";
import type { Identity, RoutedProxy } from "../proxy";
import { proxyKey } from "../proxy";
import type { Ats, RawPosting } from "../types";

/**
 * One per platform. Yields postings page by page; any thrown error aborts
 * the listing and the caller starts over from the first page.
 */
export interface AtsAdapter {
  readonly ats: Ats;
  listPostings(company: string, http: HttpClient): AsyncGenerator<RawPosting>;
}

/** What an adapter sees of the network: one JSON GET at a time. */
export interface HttpClient {
  getJson(url: string): Promise<unknown>;
}

export interface HttpClientOptions {
  identity: Identity;
  timeoutMs: number;
  /** Overrides proxy routing (tests install a MockAgent here). */
  dispatcher?: Dispatcher;
}

const proxyAgents = new Map<string, ProxyAgent>();

export function dispatcherFor(proxy: RoutedProxy | null): Dispatcher | undefined {
  if (!proxy) return undefined;

  const key = proxyKey(proxy);
  let agent = proxyAgents.get(key);
  if (!agent) {
    const token = proxy.credentials
      ? `Basic ${Buffer.from(
          `${proxy.credentials.username}:${proxy.credentials.password}`,
        ).toString("base64")}`
      : undefined;
    agent = new ProxyAgent({ uri: `http://${key}`, token });
    proxyAgents.set(key, agent);
  }
  return agent;
}

export async function closeProxyAgents(): Promise<void> {
  const agents = [...proxyAgents.values()];
  proxyAgents.clear();
  await Promise.all(agents.map((agent) => agent.close()));
}

/** Seconds or an HTTP date, as sent in Retry-After. */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now(),
): number | null {
  if (!value) return null;

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : null;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

function classifyStatus(
  url: string,
  status: number,
  retryAfter: string | null,
): PipelineError {
  if (status === 404) return new NotFoundError(url);
  if (status === 429) {
    return new RateLimitedError(url, parseRetryAfter(retryAfter));
  }
  if (status >= 500) {
    return new TransientNetworkError(`Server error ${status} on ${url}`, status);
  }
  return new HttpStatusError(url, status);
}

export async function fetchJson(
  url: string,
  options: HttpClientOptions,
): Promise<unknown> {
  const { identity, timeoutMs } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const startTime = Date.now();

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: identity.headers,
      dispatcher: options.dispatcher ?? dispatcherFor(identity.proxy),
    });

    if (!response.ok) {
      // Drain so the connection can be reused.
      await response.body?.cancel();
      throw classifyStatus(
        url,
        response.status,
        response.headers.get("Retry-After"),
      );
    }

    // Body read stays under the same timeout.
    const text = await response.text();
    logger.debug(`GET ${url} ${response.status} (${Date.now() - startTime}ms)`);

    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new MalformedError(`Response from ${url} is not JSON: ${error}`);
    }
  } catch (error) {
    if (error instanceof PipelineError) throw error;

    const isAbort = error instanceof Error && error.name === "AbortError";
    const message = isAbort
      ? `Timeout after ${timeoutMs}ms on ${url}`
      : `Connection error on ${url}: ${error instanceof Error ? error.message : String(error)}`;
    throw new TransientNetworkError(message);
  } finally {
    clearTimeout(timeout);
  }
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  return {
    getJson: (url) => fetchJson(url, options),
  };
}

export function fillTemplate(
  template: string,
  values: Record<string, string | number>,
): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in values ? encodeURIComponent(String(values[name])) : match,
  );
}

/** Appends query parameters whether or not the URL already has a query. */
export function withQuery(
  url: string,
  params: Record<string, string | number>,
): string {
  const query = Object.entries(params)
    .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`)
    .join("&");
  if (!query) return url;
  return url + (url.includes("?") ? "&" : "?") + query;
}

// Payload parsing

/** Optional payload fields: wrong types become null rather than failing the posting. */
export const optionalString = z.string().nullish().catch(null);

export const externalIdSchema = z
  .union([z.string().trim().min(1), z.number()])
  .transform(String);

export const titleSchema = z.string().trim().min(1);

export interface ParsedItem<T> {
  data: T;
  raw: unknown;
}

/** A body with the wrong overall shape fails the whole unit. */
export function parsePage<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  where: string,
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedError(
      `${where}: unexpected response shape (${issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "invalid"})`,
    );
  }
  return result.data;
}

/** Postings without an id or title are logged and skipped. */
export function parseItems<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  items: unknown[],
  where: string,
): ParsedItem<T>[] {
  const parsed: ParsedItem<T>[] = [];

  items.forEach((raw, index) => {
    const result = schema.safeParse(raw);
    if (result.success) {
      parsed.push({ data: result.data, raw });
      return;
    }
    const fields = result.error.issues
      .map((issue) => issue.path.join(".") || "posting")
      .join(", ");
    logger.warn(`${where}: skipping malformed posting #${index} (${fields})`);
  });

  return parsed;
}

export function joinNonEmpty(
  parts: Array<string | null | undefined>,
  separator: string,
): string | null {
  const kept = parts
    .map((p) => p?.trim() ?? "")
    .filter((p) => p.length > 0);
  return kept.length > 0 ? kept.join(separator) : null;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
