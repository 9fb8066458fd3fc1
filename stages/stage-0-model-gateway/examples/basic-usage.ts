/**
 * Stage 0 Model Gateway 基础用法：
 * 从全局配置组装 Gateway，以 JSON 模式发一次 chat 请求，展示返回的 content / usage / cost。
 * 可选：传入一张图片路径，作为 data URI 附件一起发送。
 */

import { readFile } from "node:fs/promises";

import {
  buildProviderConfigFromModelMaps,
  createConsoleLogger,
  createModelGateway,
  getDefaultModelFromMaps,
  getFallbackModelsFromMaps,
  getModelProviderMapFromMaps,
  isLogLevel,
  loadGlobalConfig,
  toDataUri,
  type ContentPart,
} from "../src/index.js";

const MIME_BY_EXTENSION: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  webp: "image/webp",
};

function printKnowledgePoints() {
  console.log("\n========== Stage 0 知识点 ==========");
  console.log(
    "1. 模型网关：统一封装多厂商 LLM API（OpenAI / Gemini / GLM / DeepSeek），支持模型切换、超时、降级。"
  );
  console.log(
    "2. responseFormat: \"json\" 会映射到各厂商的 JSON 模式；图片以 data URI 的 content part 发送。"
  );
  console.log(
    "3. 日志：RequestLogger 以 JSON 行输出 request / response / error；重试预算由上层（Stage 3）掌握。"
  );
  console.log("====================================\n");
}

async function loadImagePart(path: string): Promise<ContentPart> {
  const extension = path.split(".").pop()?.toLowerCase() ?? "";
  const mimeType = MIME_BY_EXTENSION[extension];
  if (!mimeType) {
    throw new Error(`Unsupported image type: ${path}`);
  }
  return { type: "image", dataUri: toDataUri(await readFile(path), mimeType) };
}

async function main() {
  printKnowledgePoints();

  const globalConfig = loadGlobalConfig();
  const defaultModel = getDefaultModelFromMaps();
  const gateway = createModelGateway({
    providers: buildProviderConfigFromModelMaps(),
    defaultModel,
    modelProviderMap: getModelProviderMapFromMaps(),
    fallbackModels: getFallbackModelsFromMaps().filter((m) => m !== defaultModel),
    timeoutMs: globalConfig.attemptTimeoutMs,
    logger: createConsoleLogger(
      isLogLevel(globalConfig.logLevel) ? globalConfig.logLevel : "info"
    ),
  });

  const imagePath = process.argv[2];
  const parts: ContentPart[] = [
    {
      type: "text",
      text: imagePath
        ? "Describe this image as JSON: {\"subject\": string, \"colors\": string[]}."
        : "Return today's weekday as JSON: {\"weekday\": string}.",
    },
  ];
  if (imagePath) {
    parts.push(await loadImagePart(imagePath));
  }

  const result = await gateway.chat({
    messages: [{ role: "user", content: parts }],
    responseFormat: "json",
    temperature: 0,
  });

  console.log("========== 结果 ==========");
  console.log("Model:", result.model, `(${result.provider})`);
  console.log("Content:", result.content);
  if (result.usage) console.log("Usage:", result.usage);
  if (result.cost) {
    console.log("Cost (美分):", result.cost.totalCents, result.cost.currency);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
