import { describe, it, expect, vi, afterEach } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import { InferenceError } from "../../src/errors.js";
import { HttpInferenceClient } from "../../src/inference/client.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { TOOL_CATALOG, toOpenAiTool } from "../../src/tools/descriptors.js";

function makeClient(overrides: Record<string, unknown> = {}): HttpInferenceClient {
  const config = parseConfig({
    inference: { baseUrl: "http://127.0.0.1:8000/v1/", model: "test-model", ...overrides },
  });
  return new HttpInferenceClient(config.inference, createSilentLogger());
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn<typeof fetch>();
  if (response instanceof Error) fetchMock.mockRejectedValue(response);
  else fetchMock.mockResolvedValue(response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): Record<string, unknown> {
  const init = fetchMock.mock.calls[0]?.[1];
  const parsed: unknown = JSON.parse(String(init?.body));
  if (typeof parsed !== "object" || parsed === null) throw new Error("body is not an object");
  return Object.fromEntries(Object.entries(parsed));
}

function sse(...events: unknown[]): Response {
  const lines = events.map((event) => `data: ${typeof event === "string" ? event : JSON.stringify(event)}\n\n`);
  return new Response(lines.join(""), { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpInferenceClient.complete", () => {
  it("posts to chat/completions and maps the response", async () => {
    const fetchMock = stubFetch(
      Response.json({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: "call_a", type: "function", function: { name: "get_memory_stats", arguments: "{}" } },
              ],
            },
          },
        ],
      }),
    );

    const result = await makeClient().complete({
      messages: [{ role: "user", content: "how much do you remember?" }],
      tools: [toOpenAiTool(TOOL_CATALOG.get_memory_stats)],
    });

    expect(result).toEqual({
      content: null,
      nativeCalls: [{ id: "call_a", name: "get_memory_stats", arguments: "{}" }],
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:8000/v1/chat/completions");
    const body = sentBody(fetchMock);
    expect(body["model"]).toBe("test-model");
    expect(body["stream"]).toBe(false);
    expect(body["tool_choice"]).toBe("auto");
    expect(body["messages"]).toEqual([{ role: "user", content: "how much do you remember?" }]);
  });

  it("omits tools when none are offered", async () => {
    const fetchMock = stubFetch(Response.json({ choices: [{ message: { content: "hi" } }] }));
    const result = await makeClient().complete({ messages: [{ role: "user", content: "hello" }] });

    expect(result).toEqual({ content: "hi", nativeCalls: [] });
    const body = sentBody(fetchMock);
    expect(body["tools"]).toBeUndefined();
    expect(body["tool_choice"]).toBeUndefined();
  });

  it("serializes assistant tool calls and tool results", async () => {
    const fetchMock = stubFetch(Response.json({ choices: [{ message: { content: "ok" } }] }));
    await makeClient().complete({
      messages: [
        { role: "assistant", content: null, toolCalls: [{ id: "c1", name: "get_memory", arguments: '{"memory_id":"m"}' }] },
        { role: "tool", content: '{"ok":true}', toolCallId: "c1", name: "get_memory" },
      ],
    });

    expect(sentBody(fetchMock)["messages"]).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", type: "function", function: { name: "get_memory", arguments: '{"memory_id":"m"}' } }],
      },
      { role: "tool", content: '{"ok":true}', tool_call_id: "c1", name: "get_memory" },
    ]);
  });

  it("sends the API key as a bearer token", async () => {
    const fetchMock = stubFetch(Response.json({ choices: [{ message: { content: "hi" } }] }));
    await makeClient({ apiKey: "test-secret" }).complete({ messages: [] });

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-secret");
  });

  it("reports a non-OK status with the body", async () => {
    stubFetch(new Response("model not loaded", { status: 503 }));
    const error = await makeClient()
      .complete({ messages: [] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InferenceError);
    expect(error).toMatchObject({ message: "Inference endpoint returned 503: model not loaded", status: 503 });
  });

  it("reports an unreachable endpoint", async () => {
    stubFetch(new TypeError("fetch failed"));
    await expect(makeClient().complete({ messages: [] })).rejects.toThrow(
      "Inference endpoint unreachable: fetch failed",
    );
  });

  it("rejects a response without choices", async () => {
    stubFetch(Response.json({ choices: [] }));
    await expect(makeClient().complete({ messages: [] })).rejects.toThrow(
      "Inference response has an unexpected shape",
    );
  });

  it("rejects a body that is not JSON", async () => {
    stubFetch(new Response("<html>", { status: 200 }));
    await expect(makeClient().complete({ messages: [] })).rejects.toThrow(/^Inference response is not JSON/);
  });
});

describe("HttpInferenceClient.stream", () => {
  it("emits tokens and assembles tool call fragments", async () => {
    const fetchMock = stubFetch(
      sse(
        { choices: [{ delta: { content: "Hel" } }] },
        { choices: [{ delta: { content: "lo" } }] },
        "{oops",
        { choices: [{ delta: { tool_calls: [{ index: 0, id: "c1", function: { name: "add_memory", arguments: '{"content":' } }] } }] },
        { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '"x"}' } }] } }] },
        "[DONE]",
      ),
    );
    const tokens: string[] = [];

    const result = await makeClient().stream({ messages: [{ role: "user", content: "hi" }] }, (token) => {
      tokens.push(token);
    });

    expect(tokens).toEqual(["Hel", "lo"]);
    expect(result).toEqual({
      content: "Hello",
      nativeCalls: [{ id: "c1", name: "add_memory", arguments: '{"content":"x"}' }],
    });
    expect(sentBody(fetchMock)["stream"]).toBe(true);
  });

  it("names calls that arrive without an id by their index", async () => {
    stubFetch(
      sse(
        { choices: [{ delta: { tool_calls: [{ index: 1, function: { name: "get_memory_stats", arguments: "{}" } }] } }] },
        "[DONE]",
      ),
    );

    const result = await makeClient().stream({ messages: [] }, () => undefined);
    expect(result.nativeCalls).toEqual([{ id: "call_1", name: "get_memory_stats", arguments: "{}" }]);
  });

  it("handles a final line without a trailing newline", async () => {
    stubFetch(new Response(`data: ${JSON.stringify({ choices: [{ delta: { content: "tail" } }] })}`));
    const result = await makeClient().stream({ messages: [] }, () => undefined);
    expect(result.content).toBe("tail");
  });
});
