import { describe, expect, it } from "vitest";
import { IdentityRotator } from "./index";

const PROXIES = [
  { host: "10.0.0.1", port: 8000 },
  { host: "10.0.0.2", port: 8000 },
];

function rotator(clock: { now: number }) {
  return new IdentityRotator({
    proxies: PROXIES,
    credentials: { username: "test-user", password: "test-secret" },
    userAgents: ["agent-a", "agent-b"],
    failureThreshold: 2,
    cooldownMs: 1000,
    random: () => 0,
    now: () => clock.now,
  });
}

describe("IdentityRotator", () => {
  it("routes direct with rotating headers when no proxies are configured", () => {
    const direct = new IdentityRotator({
      proxies: [],
      userAgents: ["agent-a", "agent-b"],
      random: () => 0.99,
    });

    const identity = direct.nextIdentity();
    expect(identity.proxy).toBeNull();
    expect(identity.headers).toEqual({
      "User-Agent": "agent-b",
      Accept: "application/json, text/plain, */*",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      Connection: "keep-alive",
    });
  });

  it("caps the pool at poolSize", () => {
    const proxies = Array.from({ length: 12 }, (_, i) => ({
      host: `10.0.1.${i}`,
      port: 3128,
    }));
    const capped = new IdentityRotator({ proxies, userAgents: [], poolSize: 10 });
    expect(capped.size).toBe(10);
  });

  it("attaches credentials to the chosen proxy", () => {
    const identity = rotator({ now: 0 }).nextIdentity();
    expect(identity.proxy).toEqual({
      host: "10.0.0.1",
      port: 8000,
      credentials: { username: "test-user", password: "test-secret" },
    });
  });

  it("cools a proxy down after consecutive failures, then brings it back", () => {
    const clock = { now: 5000 };
    const r = rotator(clock);

    const first = r.nextIdentity().proxy;
    r.reportFailure(first);
    r.reportFailure(first);

    expect(r.nextIdentity().proxy?.host).toBe("10.0.0.2");

    clock.now += 1000;
    expect(r.nextIdentity().proxy?.host).toBe("10.0.0.1");
  });

  it("falls back to the full pool when every proxy is cooling down", () => {
    const r = rotator({ now: 0 });
    for (const proxy of PROXIES) {
      const routed = { ...proxy, credentials: null };
      r.reportFailure(routed);
      r.reportFailure(routed);
    }

    expect(r.isCoolingDown(PROXIES[0])).toBe(true);
    expect(r.isCoolingDown(PROXIES[1])).toBe(true);
    expect(r.nextIdentity().proxy?.host).toBe("10.0.0.1");
  });

  it("resets the failure count on success", () => {
    const r = rotator({ now: 0 });
    const proxy = r.nextIdentity().proxy;

    r.reportFailure(proxy);
    r.reportSuccess(proxy);
    r.reportFailure(proxy);

    expect(r.isCoolingDown(PROXIES[0])).toBe(false);
  });
});
