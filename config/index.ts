import "dotenv/config";

import type {
  ProviderConfig,
  ProviderName,
} from "../stages/stage-0-model-gateway/src/types.js";

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
}

export const OPENAI_MODEL_MAP: ModelMap = {
  model: "gpt-4o-mini",
  endpoint: "https://api.openai.com/v1",
  apiKey: process.env.OPENAI_API_KEY,
};

export const GOOGLE_MODEL_MAP: ModelMap = {
  model: "gemini-2.5-flash",
  endpoint: "https://generativelanguage.googleapis.com/v1beta",
  apiKey: process.env.GOOGLE_API_KEY,
};

export const GLM_MODEL_MAP: ModelMap = {
  model: "glm-4.7",
  endpoint: "https://open.bigmodel.cn/api/paas/v4",
  apiKey: process.env.GLM_API_KEY,
};

export const DEEPSEEK_MODEL_MAP: ModelMap = {
  model: "deepseek-chat",
  endpoint: "https://api.deepseek.com/v1",
  apiKey: process.env.DEEPSEEK_API_KEY,
};

const MODEL_MAPS: Record<ProviderName, ModelMap> = {
  openai: OPENAI_MODEL_MAP,
  google: GOOGLE_MODEL_MAP,
  glm: GLM_MODEL_MAP,
  deepseek: DEEPSEEK_MODEL_MAP,
};

// fallback 顺序：openai -> google -> glm -> deepseek
const PROVIDER_ORDER: ProviderName[] = ["openai", "google", "glm", "deepseek"];

export const EXTRACTION_DEFAULTS = {
  maxRetries: 3,
  attemptTimeoutMs: 30_000,
  logLevel: "info",
} as const;

export interface GlobalConfig {
  defaultModel?: string;
  logLevel: string;
  maxRetries: number;
  attemptTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

/** Non-negative integer from env; anything else falls back. */
export function readIntEnv(
  env: Env,
  key: string,
  fallback: number
): number {
  const raw = env[key]?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return fallback;
  }
  return Number.parseInt(raw, 10);
}

// 从 .env 读取统一配置，避免在调用处直接读取环境变量
export function loadGlobalConfig(env: Env = process.env): GlobalConfig {
  return {
    defaultModel: env.DEFAULT_MODEL?.trim() || undefined,
    logLevel: env.LOG_LEVEL?.trim() || EXTRACTION_DEFAULTS.logLevel,
    maxRetries: readIntEnv(
      env,
      "EXTRACT_MAX_RETRIES",
      EXTRACTION_DEFAULTS.maxRetries
    ),
    attemptTimeoutMs: readIntEnv(
      env,
      "EXTRACT_ATTEMPT_TIMEOUT_MS",
      EXTRACTION_DEFAULTS.attemptTimeoutMs
    ),
  };
}

// 从 model map 构建 Provider 配置（只包含有 apiKey 的 provider）
export function buildProviderConfigFromModelMaps(): ProviderConfig {
  const providers: ProviderConfig = {};
  for (const name of PROVIDER_ORDER) {
    const modelMap = MODEL_MAPS[name];
    if (modelMap.apiKey) {
      providers[name] = {
        apiKey: modelMap.apiKey,
        baseUrl: modelMap.endpoint,
      };
    }
  }
  return providers;
}

// model -> provider 映射（始终包含 config 中的 model，与 apiKey 无关）
export function getModelProviderMapFromMaps(): Record<string, ProviderName> {
  const map: Record<string, ProviderName> = {};
  for (const name of PROVIDER_ORDER) {
    map[MODEL_MAPS[name].model] = name;
  }
  return map;
}

export function getFallbackModelsFromMaps(): string[] {
  return PROVIDER_ORDER.map((name) => MODEL_MAPS[name])
    .filter((modelMap) => Boolean(modelMap.apiKey && modelMap.model))
    .map((modelMap) => modelMap.model);
}

// .env DEFAULT_MODEL 优先，否则取第一个有 apiKey 的 model
export function getDefaultModelFromMaps(env: Env = process.env): string {
  const fromEnv = env.DEFAULT_MODEL?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const fallbacks = getFallbackModelsFromMaps();
  if (fallbacks.length > 0) {
    return fallbacks[0];
  }
  throw new Error(
    "No API key found. Set OPENAI_API_KEY, GOOGLE_API_KEY, GLM_API_KEY or DEEPSEEK_API_KEY in .env."
  );
}
