import { describe, it, expect, vi, beforeEach } from "vitest";
import { OllamaProvider } from "./ollama.js";

const mockFetch = vi.fn();
global.fetch = mockFetch;

const ENDPOINT = "http://localhost:11434/v1/chat/completions";

function answer(content: string) {
  return {
    ok: true,
    json: async () => ({ choices: [{ message: { content } }] }),
  };
}

describe("OllamaProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should send Ollama options and native JSON format without a key", async () => {
    mockFetch.mockResolvedValueOnce(answer("{}"));
    const provider = new OllamaProvider(ENDPOINT, "test-model", 4096);

    await provider.text("system", "user", { responseFormat: { type: "json_object" } });

    const [, options] = mockFetch.mock.calls[0];
    expect(options.headers.Authorization).toBeUndefined();
    expect(JSON.parse(options.body)).toMatchObject({
      model: "test-model",
      stream: false,
      keep_alive: "5m",
      options: { num_ctx: 4096 },
      format: "json",
    });
  });

  it("should pass a JSON schema as the format", async () => {
    mockFetch.mockResolvedValueOnce(answer("{}"));
    const provider = new OllamaProvider(ENDPOINT, "test-model", 4096);
    const schema = { type: "object" };

    await provider.text("system", "user", {
      responseFormat: { type: "json_schema", json_schema: { name: "roles", schema } },
    });

    expect(JSON.parse(mockFetch.mock.calls[0][1].body).format).toEqual(schema);
  });

  it("should run one request at a time", async () => {
    let releaseFirst: (value: unknown) => void = () => {};
    mockFetch
      .mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            releaseFirst = resolve;
          }),
      )
      .mockResolvedValueOnce(answer("second"));
    const provider = new OllamaProvider(ENDPOINT, "test-model", 4096);

    const first = provider.text("system", "first");
    const second = provider.text("system", "second");

    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(mockFetch).toHaveBeenCalledTimes(1);

    releaseFirst(answer("first"));

    expect((await first).content).toBe("first");
    expect((await second).content).toBe("second");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("should keep serving after a failed request", async () => {
    mockFetch
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockResolvedValueOnce(answer("ok"));
    const provider = new OllamaProvider(ENDPOINT, "test-model", 4096);

    await expect(provider.text("system", "user")).rejects.toThrow("connection refused");
    expect((await provider.text("system", "user")).content).toBe("ok");
  });
});
