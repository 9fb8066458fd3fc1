export { createModelGateway, describeError } from "./gateway.js";
export {
  createConsoleLogger,
  createLogSink,
  isLogLevel,
  type LogLevel,
  type LogSink,
  type LogStreams,
} from "./logger.js";
export { createDefaultCostTable, estimateCost, sumCosts } from "./cost.js";
export {
  contentToText,
  countAttachments,
  parseDataUri,
  toDataUri,
  type DecodedDataUri,
} from "./attachments.js";
export { createMergedSignal, type MergedSignal } from "./signal.js";
export { ProviderError, type LLMProvider } from "./providers/types.js";
export {
  buildProviderConfigFromModelMaps,
  getDefaultModelFromMaps,
  getFallbackModelsFromMaps,
  getModelProviderMapFromMaps,
  loadGlobalConfig,
} from "../../../config/index.js";
export type {
  ChatRequest,
  ChatResult,
  ContentPart,
  CostEstimate,
  CostTable,
  DeepSeekConfig,
  GatewayConfig,
  GLMConfig,
  GoogleConfig,
  Message,
  ModelGateway,
  OpenAIConfig,
  ProviderConfig,
  ProviderName,
  RequestLogger,
  ResponseFormat,
  Role,
  Usage,
} from "./types.js";
