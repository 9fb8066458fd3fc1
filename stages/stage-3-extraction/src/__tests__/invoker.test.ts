import { describe, expect, it } from "vitest";

import type {
  ChatRequest,
  ModelGateway,
} from "../../../stage-0-model-gateway/src/types.js";
import { createGatewayInvoker } from "../invoker.js";
import { compileRequest } from "../prompt.js";
import { receiptSchema } from "./fixtures.js";

describe("createGatewayInvoker", () => {
  it("forwards the request, signal and request id and returns usage and cost", async () => {
    const seen: ChatRequest[] = [];
    const gateway: ModelGateway = {
      async chat(request) {
        seen.push(request);
        return {
          content: "{}",
          role: "assistant",
          usage: { inputTokens: 3, outputTokens: 1, totalTokens: 4 },
          cost: { inputCents: 0.1, outputCents: 0.2, totalCents: 0.3, currency: "USD" },
        };
      },
    };
    const invoke = createGatewayInvoker(gateway, { model: "gpt-4o-mini", maxTokens: 800 });
    const request = compileRequest(receiptSchema, "x");
    const signal = new AbortController().signal;

    const response = await invoke(request, { attempt: 2, extractionId: "ex-1", signal });

    expect(seen).toEqual([
      {
        model: "gpt-4o-mini",
        messages: request.messages,
        responseFormat: "json",
        temperature: 0,
        maxTokens: 800,
        abortSignal: signal,
        requestId: "ex-1-2",
      },
    ]);
    expect(response).toEqual({
      content: "{}",
      usage: { inputTokens: 3, outputTokens: 1, totalTokens: 4 },
      cost: { inputCents: 0.1, outputCents: 0.2, totalCents: 0.3, currency: "USD" },
    });
  });
});
