export type ProviderName = "openai" | "google" | "glm" | "deepseek";

export type Role = "system" | "user" | "assistant";

/** Image parts travel as data URIs (`data:image/png;base64,...`). */
export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; dataUri: string };

export interface Message {
  role: Role;
  content: string | ContentPart[];
}

/** "json" asks the provider for its JSON mode where it has one. */
export type ResponseFormat = "text" | "json";

export interface ChatRequest {
  model?: string;
  provider?: ProviderName;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  responseFormat?: ResponseFormat;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CostEstimate {
  inputCents: number;
  outputCents: number;
  totalCents: number;
  currency: "USD";
}

export interface ChatResult {
  content: string;
  role: "assistant";
  usage?: Usage;
  finishReason?: string;
  /**
   * Raw provider payload, kept for debugging and replay only.
   */
  raw?: unknown;
  cost?: CostEstimate;
  model?: string;
  provider?: ProviderName;
  requestId?: string;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  messageCount: number;
  attachmentCount: number;
  responseFormat: ResponseFormat;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  usage?: Usage;
  finishReason?: string;
  cost?: CostEstimate;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
}

export interface ProviderCredentials {
  apiKey: string;
  baseUrl?: string;
}

export interface OpenAIConfig extends ProviderCredentials {
  organization?: string;
}

export type GoogleConfig = ProviderCredentials;
export type GLMConfig = ProviderCredentials;
export type DeepSeekConfig = ProviderCredentials;

export interface ProviderConfig {
  openai?: OpenAIConfig;
  google?: GoogleConfig;
  glm?: GLMConfig;
  deepseek?: DeepSeekConfig;
}

export interface CostTableEntry {
  inputCentsPer1k: number;
  outputCentsPer1k: number;
  currency?: "USD";
}

export type CostTable = Record<string, CostTableEntry>;

export interface GatewayConfig {
  providers: ProviderConfig;
  defaultModel?: string;
  modelProviderMap?: Record<string, ProviderName>;
  fallbackModels?: string[];
  timeoutMs?: number;
  logger?: RequestLogger;
  costTable?: CostTable;
}

export interface ModelGateway {
  chat(request: ChatRequest): Promise<ChatResult>;
}
