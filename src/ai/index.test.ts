import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { ChatCompletionsClient } from "./index";
import { ExtractionCallError } from "../errors";

const ORIGIN = "https://llm.test";
const PATH = "/v1/chat/completions";

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

function client(apiKey = "test-secret", sleeps: number[] = []) {
  return new ChatCompletionsClient({
    apiUrl: `${ORIGIN}${PATH}`,
    apiKey,
    model: "test-model",
    timeoutMs: 1000,
    dispatcher: agent,
    random: () => 0,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

describe("ChatCompletionsClient", () => {
  it("returns the completion content", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(200, {
        choices: [{ message: { content: '{"results":[]}' } }],
        usage: { prompt_tokens: 10, completion_tokens: 3 },
      });

    await expect(client().complete("system", "user")).resolves.toBe('{"results":[]}');
  });

  it("wraps a non-2xx answer with its status", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(500, "upstream down");

    const error = await client()
      .complete("system", "user")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionCallError);
    expect(error).toMatchObject({
      statusCode: 500,
      message: "test-model returned 500: upstream down",
    });
  });

  it("backs off on 429 and honours a longer Retry-After", async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: PATH, method: "POST" })
      .reply(429, "slow down", { headers: { "retry-after": "3" } });
    pool
      .intercept({ path: PATH, method: "POST" })
      .reply(200, { choices: [{ message: { content: '{"results":[]}' } }] });

    const sleeps: number[] = [];
    await expect(client("test-secret", sleeps).complete("system", "user")).resolves.toBe(
      '{"results":[]}',
    );
    expect(sleeps).toEqual([3000]);
  });

  it("gives up after five rate-limited attempts", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(429, "slow down")
      .times(5);

    const sleeps: number[] = [];
    const error = await client("test-secret", sleeps)
      .complete("system", "user")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionCallError);
    expect(error).toMatchObject({
      statusCode: 429,
      message: "test-model rate limited after 5 attempt(s)",
    });
    expect(sleeps).toEqual([2000, 4000, 8000, 16000]);
  });

  it("does not retry other failures", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(503, "maintenance");

    const sleeps: number[] = [];
    await expect(client("test-secret", sleeps).complete("system", "user")).rejects.toThrow(
      "test-model returned 503: maintenance",
    );
    expect(sleeps).toEqual([]);
  });

  it("rejects an empty completion", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(200, { choices: [{ message: { content: "" } }] });

    await expect(client().complete("system", "user")).rejects.toThrow(
      "test-model returned empty content",
    );
  });

  it("refuses to call without an API key", async () => {
    await expect(client("").complete("system", "user")).rejects.toThrow(
      "LLM_API_KEY is not configured",
    );
  });
});
