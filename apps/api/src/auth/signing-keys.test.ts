import { describe, expect, it } from "vitest";
import { IdentityProviderUnavailableError } from "./identity-errors.js";
import { HttpSigningKeySource } from "./signing-keys.js";

const KEYS_URL = "https://keys.example.test/certs";

function keyResponse(keys: Record<string, string>, maxAgeSeconds = 600) {
  return new Response(JSON.stringify(keys), {
    status: 200,
    headers: {
      "content-type": "application/json",
      "cache-control": `public, max-age=${maxAgeSeconds}`
    }
  });
}

function createSource(responses: Array<() => Response>) {
  const clock = { now: 1_000_000 };
  const sleeps: number[] = [];
  let calls = 0;

  const fetchImpl: typeof fetch = async () => {
    const next = responses[Math.min(calls, responses.length - 1)];
    calls += 1;

    if (!next) {
      throw new Error("No response configured");
    }

    return next();
  };

  const source = new HttpSigningKeySource({
    url: KEYS_URL,
    timeoutMs: 1000,
    attempts: 3,
    backoffMs: 250,
    fetchImpl,
    now: () => clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });

  return { source, clock, sleeps, calls: () => calls };
}

describe("http signing key source", () => {
  it("serves keys from cache until max-age passes", async () => {
    const { source, clock, calls } = createSource([() => keyResponse({ "kid-1": "cert-one" })]);

    expect(await source.getKey("kid-1")).toBe("cert-one");
    expect(await source.getKey("kid-1")).toBe("cert-one");
    expect(calls()).toBe(1);

    clock.now += 601_000;

    expect(await source.getKey("kid-1")).toBe("cert-one");
    expect(calls()).toBe(2);
  });

  it("returns null for a key id the provider does not publish", async () => {
    const { source } = createSource([() => keyResponse({ "kid-1": "cert-one" })]);

    expect(await source.getKey("kid-2")).toBeNull();
  });

  it("retries a failed fetch with linear backoff", async () => {
    const { source, sleeps, calls } = createSource([
      () => new Response("unavailable", { status: 503 }),
      () => new Response("unavailable", { status: 503 }),
      () => keyResponse({ "kid-1": "cert-one" })
    ]);

    expect(await source.getKey("kid-1")).toBe("cert-one");
    expect(calls()).toBe(3);
    expect(sleeps).toEqual([250, 500]);
  });

  it("reports the provider as unavailable once every attempt fails", async () => {
    const { source, sleeps } = createSource([() => new Response("unavailable", { status: 500 })]);

    await expect(source.getKey("kid-1")).rejects.toBeInstanceOf(IdentityProviderUnavailableError);
    expect(sleeps).toEqual([250, 500]);
  });

  it("limits how often a forced refresh hits the provider", async () => {
    const { source, clock, calls } = createSource([
      () => keyResponse({ "kid-1": "cert-one" }),
      () => keyResponse({ "kid-1": "cert-one", "kid-2": "cert-two" })
    ]);

    await source.getKey("kid-1");
    clock.now += 10_000;

    expect(await source.getKey("kid-2", { forceRefresh: true })).toBeNull();
    expect(calls()).toBe(1);

    clock.now += 30_000;

    expect(await source.getKey("kid-2", { forceRefresh: true })).toBe("cert-two");
    expect(calls()).toBe(2);
  });

  it("shares one fetch between concurrent lookups", async () => {
    const { source, calls } = createSource([() => keyResponse({ "kid-1": "cert-one" })]);

    const results = await Promise.all([source.getKey("kid-1"), source.getKey("kid-1")]);

    expect(results).toEqual(["cert-one", "cert-one"]);
    expect(calls()).toBe(1);
  });
});
