import { afterEach, describe, expect, it, vi } from "vitest";

import { ChatCompletionsClient, ChatRequestError } from "../src/core/ai/chat-client.js";
import { ChatTextGenerator } from "../src/core/ai/generator.js";
import { ExecutionError, RunCancelledError } from "../src/core/errors.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }], usage: { total_tokens: 42 } }), {
    status: 200,
    headers: { "Content-Type": "application/json" }
  });
}

function stubFetch(...responses: Array<() => Response>) {
  let index = 0;
  const fetchMock = vi.fn(async (...args: FetchArgs): Promise<Response> => {
    const signal = args[1]?.signal;
    if (signal?.aborted) {
      throw new DOMException("The operation was aborted.", "AbortError");
    }
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (!next) throw new TypeError("fetch failed");
    return next();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestBody(fetchMock: ReturnType<typeof stubFetch>, call = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
}

describe("chat completions client", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the messages and returns the first choice", async () => {
    const fetchMock = stubFetch(() => completion("Who is the customer?"));
    const client = new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1/", apiKey: "test-key" });

    const result = await client.complete("llama3.1:8b", [{ role: "user", content: "ask" }], { temperature: 0.7 });

    expect(result).toEqual({ content: "Who is the customer?", tokens: 42 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key"
    });
    expect(requestBody(fetchMock)).toEqual({
      model: "llama3.1:8b",
      messages: [{ role: "user", content: "ask" }],
      temperature: 0.7
    });
  });

  it("leaves temperature out for reasoning models", async () => {
    const fetchMock = stubFetch(() => completion("ok"));
    const client = new ChatCompletionsClient({ baseUrl: "https://api.example.test/v1" });

    await client.complete("o3-mini", [{ role: "user", content: "ask" }], { temperature: 0.7 });

    expect(requestBody(fetchMock)).toEqual({ model: "o3-mini", messages: [{ role: "user", content: "ask" }] });
  });

  it("retries transient failures with backoff", async () => {
    const fetchMock = stubFetch(
      () => new Response("overloaded", { status: 503 }),
      () => completion("second time lucky")
    );
    const client = new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1", baseDelayMs: 1 });

    const result = await client.complete("llama3.1:8b", [{ role: "user", content: "ask" }]);

    expect(result.content).toBe("second time lucky");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured number of attempts", async () => {
    const fetchMock = stubFetch(() => new Response("rate limited", { status: 429 }));
    const client = new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1", baseDelayMs: 1, maxAttempts: 2 });

    await expect(client.complete("llama3.1:8b", [{ role: "user", content: "ask" }])).rejects.toThrow(
      "Chat request failed (429): rate limited"
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const fetchMock = stubFetch(() => new Response("model not found", { status: 404 }));
    const client = new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1", baseDelayMs: 1 });

    await expect(client.complete("missing", [{ role: "user", content: "ask" }])).rejects.toMatchObject({
      name: "ChatRequestError",
      status: 404
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects responses without a message", async () => {
    stubFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    const client = new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1" });

    await expect(client.complete("llama3.1:8b", [{ role: "user", content: "ask" }])).rejects.toBeInstanceOf(
      ChatRequestError
    );
  });
});

describe("chat text generator", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the panel system prompt with the user prompt", async () => {
    const fetchMock = stubFetch(() => completion("1. What's the ROI?"));
    const generator = new ChatTextGenerator(new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1" }), "llama3.1:8b");

    const output = await generator.generate("You are the CEO.");

    expect(output).toBe("1. What's the ROI?");
    const body = requestBody(fetchMock);
    expect(body).toMatchObject({ model: "llama3.1:8b", temperature: 0.7 });
    expect(body).toHaveProperty(["messages", 1], { role: "user", content: "You are the CEO." });
    expect(body).toHaveProperty(["messages", 0, "role"], "system");
  });

  it("falls back to a default model id", () => {
    const generator = new ChatTextGenerator(new ChatCompletionsClient({ baseUrl: "https://api.example.test/v1" }), undefined);

    expect(generator.description).toBe("gpt-4o-mini at https://api.example.test/v1/chat/completions");
  });

  it("wraps request failures as execution errors", async () => {
    stubFetch(() => new Response("bad request", { status: 400 }));
    const generator = new ChatTextGenerator(new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1" }), "llama3.1:8b");

    await expect(generator.generate("prompt")).rejects.toBeInstanceOf(ExecutionError);
  });

  it("reports cancellation when the caller's signal aborted", async () => {
    stubFetch(() => completion("never read"));
    const generator = new ChatTextGenerator(new ChatCompletionsClient({ baseUrl: "http://localhost:11434/v1" }), "llama3.1:8b");
    const controller = new AbortController();
    controller.abort();

    await expect(generator.generate("prompt", { signal: controller.signal })).rejects.toBeInstanceOf(RunCancelledError);
  });
});
