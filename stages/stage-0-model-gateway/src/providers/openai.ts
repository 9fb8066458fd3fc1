import type {
  ChatRequest,
  ChatResult,
  Message,
  OpenAIConfig,
  ProviderName,
} from "../types.js";
import { ProviderError, type LLMProvider } from "./types.js";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

type OpenAIContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

interface OpenAIMessage {
  role: Message["role"];
  content: string | OpenAIContentPart[];
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

interface OpenAIErrorPayload {
  error?: { message?: string; code?: string | null; type?: string };
}

function buildHeaders(config: OpenAIConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${config.apiKey}`,
  };

  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

export function toOpenAIMessages(messages: Message[]): OpenAIMessage[] {
  return messages.map((message) => {
    if (typeof message.content === "string") {
      return { role: message.role, content: message.content };
    }
    return {
      role: message.role,
      content: message.content.map(
        (part): OpenAIContentPart =>
          part.type === "text"
            ? { type: "text", text: part.text }
            : { type: "image_url", image_url: { url: part.dataUri } }
      ),
    };
  });
}

async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  try {
    const payload = JSON.parse(text) as OpenAIErrorPayload;
    if (payload.error?.message) {
      return {
        message: payload.error.message,
        code: payload.error.code ?? payload.error.type,
      };
    }
  } catch (error) {
    // body is not JSON; fall through to raw text
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
  }
  return { message: text || `Request failed with status ${response.status}` };
}

async function callOpenAICompatible(
  providerName: ProviderName,
  request: ChatRequest,
  config: OpenAIConfig,
  defaultBaseUrl: string
): Promise<ChatResult> {
  if (!request.model) {
    throw new ProviderError({
      provider: providerName,
      message: "Model is required for OpenAI-compatible providers.",
    });
  }

  if (!config.apiKey) {
    throw new ProviderError({
      provider: providerName,
      message: "API key is required for OpenAI-compatible providers.",
    });
  }

  const body: Record<string, unknown> = {
    model: request.model,
    messages: toOpenAIMessages(request.messages),
    temperature: request.temperature,
    max_tokens: request.maxTokens,
  };
  if (request.responseFormat === "json") {
    body.response_format = { type: "json_object" };
  }

  const baseUrl = config.baseUrl ?? defaultBaseUrl;
  const response = await fetch(`${baseUrl}/chat/completions`, {
    method: "POST",
    headers: buildHeaders(config),
    body: JSON.stringify(body),
    signal: request.abortSignal,
  });

  if (!response.ok) {
    const errorDetails = await parseErrorMessage(response);
    throw new ProviderError({
      provider: providerName,
      message: errorDetails.message,
      status: response.status,
      code: errorDetails.code,
    });
  }

  const data = (await response.json()) as OpenAIChatResponse;
  const choice = data.choices?.[0];
  const content = choice?.message?.content ?? "";

  return {
    content,
    role: "assistant",
    finishReason: choice?.finish_reason,
    usage: data.usage
      ? {
          inputTokens: data.usage.prompt_tokens ?? 0,
          outputTokens: data.usage.completion_tokens ?? 0,
          totalTokens: data.usage.total_tokens ?? 0,
        }
      : undefined,
    raw: data,
  };
}

export function createOpenAICompatibleProvider(
  providerName: ProviderName,
  config: OpenAIConfig,
  defaultBaseUrl: string
): LLMProvider {
  return {
    name: providerName,
    chat(request: ChatRequest) {
      return callOpenAICompatible(
        providerName,
        request,
        config,
        defaultBaseUrl
      );
    },
  };
}

export function createOpenAIProvider(config: OpenAIConfig): LLMProvider {
  return createOpenAICompatibleProvider(
    "openai",
    config,
    DEFAULT_OPENAI_BASE_URL
  );
}
