import { describe, it, expect, vi, beforeEach } from "vitest";
import { GenericProvider } from "./generic.js";

const mockFetch = vi.fn();
global.fetch = mockFetch;

const ENDPOINT = "https://llm.example.test/v1/chat/completions";

describe("GenericProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should post an OpenAI-compatible request and map the answer", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({
        choices: [{ message: { content: '{"0": "name"}' } }],
        model: "served-model",
        usage: { prompt_tokens: 120, completion_tokens: 8, total_tokens: 128 },
      }),
    });
    const provider = new GenericProvider(ENDPOINT, "test-model", "test-secret");
    const controller = new AbortController();

    const response = await provider.text("system", "user", {
      responseFormat: { type: "json_object" },
      signal: controller.signal,
    });

    expect(response).toEqual({
      content: '{"0": "name"}',
      model: "served-model",
      usage: { promptTokens: 120, completionTokens: 8, totalTokens: 128 },
    });

    const [url, options] = mockFetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(options.method).toBe("POST");
    expect(options.signal).toBe(controller.signal);
    expect(options.headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(options.body)).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "system" },
        { role: "user", content: "user" },
      ],
      temperature: 0,
      max_tokens: 1024,
      response_format: { type: "json_object" },
    });
  });

  it("should fall back to the requested model and empty content", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ choices: [] }) });
    const provider = new GenericProvider(ENDPOINT, "test-model", "test-secret");

    const response = await provider.text("system", "user", { model: "other-model" });

    expect(response).toEqual({ content: "", model: "other-model", usage: undefined });
  });

  it("should throw error on non-2xx response", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 401,
      text: async () => "invalid key",
    });
    const provider = new GenericProvider(ENDPOINT, "test-model", "test-secret");

    await expect(provider.text("system", "user")).rejects.toThrow(
      "generic API error (401): invalid key",
    );
  });
});
