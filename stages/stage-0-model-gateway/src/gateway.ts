import { randomUUID } from "node:crypto";

import { countAttachments } from "./attachments.js";
import { createDefaultCostTable, estimateCost } from "./cost.js";
import { createConsoleLogger } from "./logger.js";
import { buildProviderRegistry } from "./providers/registry.js";
import type { LLMProvider } from "./providers/types.js";
import { createMergedSignal } from "./signal.js";
import type {
  ChatRequest,
  ChatResult,
  GatewayConfig,
  ModelGateway,
  ProviderName,
  RequestLogger,
} from "./types.js";

const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "gpt-4o": "openai",
  "gpt-4o-mini": "openai",
  "gpt-4.1-mini": "openai",
  "gemini-2.5-flash": "google",
  "gemini-2.0-flash": "google",
  "glm-4.7": "glm",
  "glm-4-flash": "glm",
  "glm-4v-plus": "glm",
  "deepseek-chat": "deepseek",
  "deepseek-reasoner": "deepseek",
};

function resolveTimeout(
  request: ChatRequest,
  config: GatewayConfig
): number | undefined {
  const requestTimeout = request.timeoutMs ?? Number.POSITIVE_INFINITY;
  const configTimeout = config.timeoutMs ?? Number.POSITIVE_INFINITY;
  const min = Math.min(requestTimeout, configTimeout);
  return Number.isFinite(min) ? min : undefined;
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new Error(`No provider mapping found for model: ${model}`);
  }

  return provider;
}

function ensureProvider(
  registry: Map<ProviderName, LLMProvider>,
  providerName: ProviderName
): LLMProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new Error(`Provider not configured: ${providerName}`);
  }
  return provider;
}

export function describeError(error: unknown): {
  name: string;
  message: string;
  status?: number;
  code?: string;
} {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      status:
        "status" in error && typeof error.status === "number"
          ? error.status
          : undefined,
      code:
        "code" in error && typeof error.code === "string"
          ? error.code
          : undefined,
    };
  }
  return { name: "Error", message: String(error) };
}

/**
 * One chat call against the first model that answers: the requested model, then
 * each fallback in order. No retries here; the caller owns its attempt budget.
 */
export function createModelGateway(config: GatewayConfig): ModelGateway {
  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const registry = buildProviderRegistry(config.providers);
  const logger: RequestLogger = config.logger ?? createConsoleLogger("info");
  const costTable = config.costTable ?? createDefaultCostTable();

  async function chat(request: ChatRequest): Promise<ChatResult> {
    const model = request.model ?? config.defaultModel;
    if (!model) {
      throw new Error(
        "Model is required. Provide request.model or config.defaultModel."
      );
    }

    const modelsToTry = [
      model,
      ...(config.fallbackModels ?? []).filter((m) => m !== model),
    ];
    const timeoutMs = resolveTimeout(request, config);
    const requestId = request.requestId ?? randomUUID();

    let lastError: unknown;

    for (const candidate of modelsToTry) {
      if (request.abortSignal?.aborted) {
        break;
      }

      const providerName = resolveProviderName(
        candidate,
        // an explicit provider only pins the primary model
        candidate === model ? request.provider : undefined,
        modelProviderMap
      );
      const provider = ensureProvider(registry, providerName);
      const attemptStart = Date.now();

      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model: candidate,
        provider: providerName,
        messageCount: request.messages.length,
        attachmentCount: countAttachments(request.messages),
        responseFormat: request.responseFormat ?? "text",
        timeoutMs,
      });

      const merged = createMergedSignal(request.abortSignal, timeoutMs);
      try {
        const result = await provider.chat({
          ...request,
          model: candidate,
          provider: providerName,
          requestId,
          abortSignal: merged.signal,
        });

        const durationMs = Date.now() - attemptStart;
        const cost = estimateCost(result.usage, candidate, costTable);

        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs,
          usage: result.usage,
          finishReason: result.finishReason,
          cost,
        });

        return {
          ...result,
          cost,
          model: candidate,
          provider: providerName,
          requestId,
        };
      } catch (error) {
        lastError = error;
        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          error: describeError(error),
        });
      } finally {
        merged.cancel();
      }
    }

    throw (
      lastError ?? new Error("Model Gateway failed without an explicit error.")
    );
  }

  return { chat };
}
