import type { ProviderConfig, ProviderName } from "../types.js";
import { createGoogleProvider } from "./google.js";
import { createOpenAICompatibleProvider, createOpenAIProvider } from "./openai.js";
import type { LLMProvider } from "./types.js";

/** OpenAI-compatible chat-completions endpoints other than OpenAI itself. */
const COMPATIBLE_BASE_URLS = {
  glm: "https://open.bigmodel.cn/api/paas/v4",
  deepseek: "https://api.deepseek.com/v1",
} as const;

export function buildProviderRegistry(
  providers: ProviderConfig
): Map<ProviderName, LLMProvider> {
  const registry = new Map<ProviderName, LLMProvider>();

  if (providers.openai) {
    registry.set("openai", createOpenAIProvider(providers.openai));
  }
  if (providers.google) {
    registry.set("google", createGoogleProvider(providers.google));
  }
  if (providers.glm) {
    registry.set(
      "glm",
      createOpenAICompatibleProvider("glm", providers.glm, COMPATIBLE_BASE_URLS.glm)
    );
  }
  if (providers.deepseek) {
    registry.set(
      "deepseek",
      createOpenAICompatibleProvider(
        "deepseek",
        providers.deepseek,
        COMPATIBLE_BASE_URLS.deepseek
      )
    );
  }

  return registry;
}
