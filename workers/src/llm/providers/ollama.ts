/**
 * Local development provider targeting an Ollama instance.
 * Adds Ollama-specific options (num_ctx, keep_alive, native JSON format) to
 * the generic payload and serializes calls so a local model is never hit
 * concurrently.
 */

import type {
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import { GenericProvider } from "./generic.js";

export class OllamaProvider extends GenericProvider {
  name = "ollama";

  private chatQueue: Promise<void> = Promise.resolve();

  constructor(
    endpoint: string,
    defaultModel: string,
    protected numCtx: number,
  ) {
    super(endpoint, defaultModel, "");
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const requestBody: Record<string, unknown> = {
      model: options?.model || this.defaultModel,
      messages,
      temperature: options?.temperature ?? 0,
      max_tokens: options?.maxTokens ?? 1024,
      stream: false,
      keep_alive: "5m",
      options: {
        num_ctx: this.numCtx,
      },
    };

    const format = options?.responseFormat;
    if (format?.type === "json_schema" && format.json_schema) {
      requestBody.format = format.json_schema.schema;
    } else if (format?.type === "json_object") {
      requestBody.format = "json";
    }

    return requestBody;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const run = this.chatQueue.then(() => this._doChat(messages, options));
    // the next call waits for this one whether it succeeds or not
    this.chatQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
