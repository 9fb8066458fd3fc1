import type { ModelGateway } from "../../stage-0-model-gateway/src/types.js";
import type { InvokeModel } from "./types.js";

export interface GatewayInvokerOptions {
  /** Used when the request names no model; else the gateway's default. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Adapt a model gateway to the extractor's `invokeModel`. */
export function createGatewayInvoker(
  gateway: ModelGateway,
  options: GatewayInvokerOptions = {}
): InvokeModel {
  return async (request, context) => {
    const result = await gateway.chat({
      model: request.model ?? options.model,
      messages: request.messages,
      responseFormat: request.responseFormat,
      temperature: options.temperature ?? 0,
      maxTokens: options.maxTokens,
      abortSignal: context.signal,
      requestId: `${context.extractionId}-${context.attempt}`,
    });
    return { content: result.content, usage: result.usage, cost: result.cost };
  };
}
