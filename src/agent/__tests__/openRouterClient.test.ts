import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { requireOpenRouterApiKey } from "../../config/constants.js";
import { createOpenRouterModel } from "../openRouterClient.js";
import { messageText } from "../openRouterUtils.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

const BASE_URL = "https://openrouter.example.test/api/v1";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe("OpenRouter client", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it("should post the chat request and return the message text", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: '{"next_action":"FINALIZE"}' } }] }),
    );
    const model = createOpenRouterModel({
      model: "test/planner",
      maxTokens: 256,
      jsonMode: true,
      apiKey: "test-secret",
      baseUrl: BASE_URL,
    });

    const text = await model.complete([{ role: "user", content: "hi" }]);

    expect(text).toBe('{"next_action":"FINALIZE"}');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE_URL}/chat/completions`);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test/planner",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0,
      max_tokens: 256,
      response_format: { type: "json_object" },
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should omit optional fields when not configured", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const model = createOpenRouterModel({
      model: "test/narrator",
      temperature: 0.1,
      apiKey: "test-secret",
      baseUrl: BASE_URL,
    });

    await model.complete([{ role: "user", content: "hi" }]);

    const init = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test/narrator",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.1,
    });
  });

  it("should include the status and body of a failed response", async () => {
    fetchMock.mockResolvedValue(
      new Response("rate limited", { status: 429, statusText: "Too Many Requests" }),
    );
    const model = createOpenRouterModel({ model: "m", apiKey: "test-secret", baseUrl: BASE_URL });

    await expect(model.complete([])).rejects.toThrow(
      "OpenRouter request failed (429 Too Many Requests): rate limited",
    );
  });

  it("should reject a payload without choices", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { message: "quota exceeded" } }));
    const model = createOpenRouterModel({ model: "m", apiKey: "test-secret", baseUrl: BASE_URL });

    await expect(model.complete([])).rejects.toThrow(
      "No choices returned from OpenRouter: quota exceeded",
    );
  });

  it("should wrap network failures with the model name", async () => {
    const cause = new TypeError("fetch failed");
    fetchMock.mockRejectedValue(cause);
    const model = createOpenRouterModel({ model: "test/m", apiKey: "test-secret", baseUrl: BASE_URL });

    const error = await model.complete([]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error ? error.message : "").toBe("OpenRouter request to test/m failed");
    expect(error instanceof Error ? error.cause : undefined).toBe(cause);
  });

  it("should require an API key before calling out", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "");
    const model = createOpenRouterModel({ model: "m", baseUrl: BASE_URL });

    await expect(model.complete([])).rejects.toThrow(
      "Environment variable OPENROUTER_API_KEY must be set to call the planner or narrator.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should read the API key from the given environment", () => {
    expect(requireOpenRouterApiKey({ OPENROUTER_API_KEY: "test-secret" })).toBe("test-secret");
  });
});

describe("messageText", () => {
  it("should pass strings through", () => {
    expect(messageText("plain")).toBe("plain");
  });

  it("should join content parts", () => {
    expect(messageText([{ type: "text", text: "Hello, " }, "world", { type: "image" }])).toBe(
      "Hello, world",
    );
  });

  it("should read a single text part", () => {
    expect(messageText({ text: "single" })).toBe("single");
  });

  it("should map empty values to an empty string", () => {
    expect(messageText(null)).toBe("");
    expect(messageText(undefined)).toBe("");
  });
});
