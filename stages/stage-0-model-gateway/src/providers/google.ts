import { parseDataUri } from "../attachments.js";
import type {
  ChatRequest,
  ChatResult,
  GoogleConfig,
  Message,
} from "../types.js";
import { ProviderError, type LLMProvider } from "./types.js";

const DEFAULT_GOOGLE_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";

type GeminiPart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } };

type ContentItem =
  | { role: "user" | "model"; parts: GeminiPart[] }
  | { parts: GeminiPart[] };

interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}

interface GeminiErrorPayload {
  error?: { message?: string; code?: number; status?: string };
}

function toParts(content: Message["content"]): GeminiPart[] {
  if (typeof content === "string") {
    return [{ text: content }];
  }
  return content.map((part): GeminiPart => {
    if (part.type === "text") {
      return { text: part.text };
    }
    const { mimeType, base64 } = parseDataUri(part.dataUri);
    return { inlineData: { mimeType, data: base64 } };
  });
}

function systemText(content: Message["content"]): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");
}

export function toGeminiContents(messages: Message[]): {
  system?: string;
  contents: ContentItem[];
} {
  const systemParts: string[] = [];
  const contents: ContentItem[] = [];

  for (const message of messages) {
    if (message.role === "system") {
      systemParts.push(systemText(message.content));
    } else {
      const role = message.role === "assistant" ? "model" : "user";
      contents.push({ role, parts: toParts(message.content) });
    }
  }

  const system = systemParts.length > 0 ? systemParts.join("\n") : undefined;

  // Single-turn: one user message only. Match the official format without role.
  const only = contents[0];
  if (contents.length === 1 && only && "role" in only && only.role === "user") {
    return { system, contents: [{ parts: only.parts }] };
  }

  return { system, contents };
}

async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  try {
    const payload = JSON.parse(text) as GeminiErrorPayload;
    if (payload.error?.message) {
      return {
        message: payload.error.message,
        code: payload.error.status ?? payload.error.code?.toString(),
      };
    }
  } catch (error) {
    // body is not JSON; fall through to raw text
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
  }
  return {
    message: text || `Request failed with status ${response.status}`,
  };
}

export function createGoogleProvider(config: GoogleConfig): LLMProvider {
  return {
    name: "google",
    async chat(request: ChatRequest): Promise<ChatResult> {
      if (!request.model) {
        throw new ProviderError({
          provider: "google",
          message: "Model is required for Google Gemini.",
        });
      }
      if (!config.apiKey) {
        throw new ProviderError({
          provider: "google",
          message: "API key is required for Google Gemini.",
        });
      }

      const baseUrl = config.baseUrl ?? DEFAULT_GOOGLE_BASE_URL;
      const { system, contents } = toGeminiContents(request.messages);

      const generationConfig: Record<string, unknown> = {
        temperature: request.temperature ?? 0.7,
        maxOutputTokens: request.maxTokens,
      };
      if (request.responseFormat === "json") {
        generationConfig.responseMimeType = "application/json";
      }

      const body: Record<string, unknown> = { contents, generationConfig };
      if (system) {
        body.systemInstruction = { parts: [{ text: system }] };
      }

      const url = `${baseUrl}/models/${request.model}:generateContent`;
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": config.apiKey,
        },
        body: JSON.stringify(body),
        signal: request.abortSignal,
      });

      if (!response.ok) {
        const errorDetails = await parseErrorMessage(response);
        throw new ProviderError({
          provider: "google",
          message: errorDetails.message,
          status: response.status,
          code: errorDetails.code,
        });
      }

      const data = (await response.json()) as GeminiResponse;

      const candidate = data.candidates?.[0];
      const content =
        candidate?.content?.parts?.map((p) => p.text ?? "").join("") ?? "";

      if (!data.candidates?.length || content === "") {
        const reason = candidate?.finishReason;
        throw new ProviderError({
          provider: "google",
          message: reason
            ? `Gemini returned no text (finishReason: ${reason}).`
            : "Gemini returned no candidates or empty content (possible safety filter or empty response).",
        });
      }

      const usage = data.usageMetadata
        ? {
            inputTokens: data.usageMetadata.promptTokenCount ?? 0,
            outputTokens: data.usageMetadata.candidatesTokenCount ?? 0,
            totalTokens: data.usageMetadata.totalTokenCount ?? 0,
          }
        : undefined;

      return {
        content,
        role: "assistant",
        finishReason: candidate?.finishReason,
        usage,
        raw: data,
      };
    },
  };
}
