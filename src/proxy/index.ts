import { logger } from "../logger";
import type { ProxyEndpoint } from "../config";

export interface ProxyCredentials {
  username: string;
  password: string;
}

export interface RoutedProxy extends ProxyEndpoint {
  credentials: ProxyCredentials | null;
}

export interface Identity {
  proxy: RoutedProxy | null;
  headers: Record<string, string>;
}

export interface IdentityRotatorOptions {
  proxies: ProxyEndpoint[];
  credentials?: ProxyCredentials | null;
  userAgents: string[];
  poolSize?: number;
  failureThreshold?: number;
  cooldownMs?: number;
  random?: () => number;
  now?: () => number;
}

interface ProxyHealth {
  consecutiveFailures: number;
  coolingUntil: number;
}

const FALLBACK_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export function proxyKey(proxy: ProxyEndpoint): string {
  return `${proxy.host}:${proxy.port}`;
}

/**
 * Hands out a proxy + header set per outbound request and tracks transport
 * failures per proxy. A proxy that hits the failure threshold sits out for
 * the cooldown window.
 */
export class IdentityRotator {
  private readonly pool: RoutedProxy[];
  private readonly userAgents: string[];
  private readonly health = new Map<string, ProxyHealth>();
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: IdentityRotatorOptions) {
    const credentials = options.credentials ?? null;
    this.pool = options.proxies
      .slice(0, options.poolSize ?? 10)
      .map((p) => ({ ...p, credentials }));
    this.userAgents =
      options.userAgents.length > 0 ? options.userAgents : [FALLBACK_USER_AGENT];
    this.failureThreshold = options.failureThreshold ?? 3;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.pool.length;
  }

  nextIdentity(): Identity {
    return {
      proxy: this.pickProxy(),
      headers: this.buildHeaders(),
    };
  }

  reportFailure(proxy: RoutedProxy | null): void {
    if (!proxy) return;

    const key = proxyKey(proxy);
    const entry = this.health.get(key) ?? {
      consecutiveFailures: 0,
      coolingUntil: 0,
    };
    entry.consecutiveFailures += 1;

    if (entry.consecutiveFailures >= this.failureThreshold) {
      entry.coolingUntil = this.now() + this.cooldownMs;
      entry.consecutiveFailures = 0;
      logger.warn(
        `Proxy ${key}: ${this.failureThreshold} consecutive failures, cooling down for ${this.cooldownMs}ms`,
      );
    }

    this.health.set(key, entry);
  }

  reportSuccess(proxy: RoutedProxy | null): void {
    if (!proxy) return;
    const entry = this.health.get(proxyKey(proxy));
    if (entry) entry.consecutiveFailures = 0;
  }

  isCoolingDown(proxy: ProxyEndpoint): boolean {
    const entry = this.health.get(proxyKey(proxy));
    return !!entry && entry.coolingUntil > this.now();
  }

  private pickProxy(): RoutedProxy | null {
    if (this.pool.length === 0) return null;

    const available = this.pool.filter((p) => !this.isCoolingDown(p));
    const candidates = available.length > 0 ? available : this.pool;
    return this.pick(candidates);
  }

  private buildHeaders(): Record<string, string> {
    return {
      "User-Agent": this.pick(this.userAgents),
      Accept: "application/json, text/plain, */*",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      Connection: "keep-alive",
    };
  }

  private pick<T>(items: readonly T[]): T {
    const index = Math.min(
      Math.floor(this.random() * items.length),
      items.length - 1,
    );
    return items[index];
  }
}
