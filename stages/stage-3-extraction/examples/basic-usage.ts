/**
 * Stage 3 Extraction 基础用法：
 * - 从会议记录中抽取工单（ticket）与子任务（subtask），二者共享 "work-item" id 空间
 * - dependencies 可以指向任意工单或子任务（引用必须能解析）
 * - 校验失败时，Retry Controller 把违规项回填给模型，请它只修正这些字段
 * 输出：每次尝试的结果、最终数据或失败诊断。
 */

import {
  buildProviderConfigFromModelMaps,
  createConsoleLogger,
  createModelGateway,
  getDefaultModelFromMaps,
  getFallbackModelsFromMaps,
  getModelProviderMapFromMaps,
  isLogLevel,
  loadGlobalConfig,
} from "../../stage-0-model-gateway/src/index.js";
import {
  arrayOf,
  defineSchema,
  defineShape,
  enumOf,
  idField,
  refs,
  string,
} from "../../stage-1-schema/src/index.js";
import { createExtractor, createGatewayInvoker } from "../src/index.js";

const TRANSCRIPT = `
Alice: The login page times out for customers on mobile. That's top priority.
Bob: I'll reproduce it first, then we need a fix in the session service.
Alice: After the fix ships, update the status page. Not urgent.
Carol: Also the export to CSV drops accents. Medium, can wait for next sprint.
`;

const subtask = defineShape({
  name: "subtask",
  description: "A concrete step needed to finish a ticket",
  fields: [idField("id", "work-item"), string("name")],
});

const ticket = defineShape({
  name: "ticket",
  fields: [
    idField("id", "work-item"),
    string("name", { description: "Short title" }),
    string("description"),
    enumOf("priority", [
      { value: "high", meaning: "Blocks customers or a release" },
      { value: "medium", meaning: "Should be done this or next sprint" },
      { value: "low", meaning: "Nice to have" },
    ]),
    arrayOf("subtasks", subtask, { required: false }),
    refs("dependencies", "work-item", {
      required: false,
      description: "Ids of tickets or subtasks that must be finished first",
    }),
  ],
});

const schema = defineSchema(
  defineShape({ name: "ticket_list", fields: [arrayOf("tickets", ticket)] }),
  {
    name: "meeting_tickets",
    document: {
      version: "1",
      text: "One ticket per actionable item. Split multi-step work into subtasks.",
    },
  }
);

interface Ticket {
  id: string;
  name: string;
  priority: "high" | "medium" | "low";
  subtasks: Array<{ id: string; name: string }>;
  dependencies: string[];
}

async function main() {
  const globalConfig = loadGlobalConfig();
  const defaultModel = getDefaultModelFromMaps();
  const logLevel = isLogLevel(globalConfig.logLevel) ? globalConfig.logLevel : "info";

  const gateway = createModelGateway({
    providers: buildProviderConfigFromModelMaps(),
    defaultModel,
    modelProviderMap: getModelProviderMapFromMaps(),
    fallbackModels: getFallbackModelsFromMaps().filter((m) => m !== defaultModel),
    timeoutMs: globalConfig.attemptTimeoutMs,
    logger: createConsoleLogger("error"),
  });

  const extractor = createExtractor({
    invokeModel: createGatewayInvoker(gateway),
    maxRetries: globalConfig.maxRetries,
    attemptTimeoutMs: globalConfig.attemptTimeoutMs,
    logLevel,
  });

  const outcome = await extractor.extract<{ tickets: Ticket[] }>(
    schema,
    `Extract the tickets discussed in this meeting:\n${TRANSCRIPT}`
  );

  console.log("\n========== 结果 ==========");
  if (!outcome.success) {
    console.log(outcome.error.report());
    process.exitCode = 1;
    return;
  }

  console.log(`Attempts: ${outcome.attempts.length}`);
  for (const t of outcome.data.tickets) {
    const deps = t.dependencies
      .map((id) => {
        const target = outcome.index.resolve("work-item", id);
        return target ? `${id} (${target.shape})` : id;
      })
      .join(", ");
    console.log(`- [${t.priority}] ${t.id} ${t.name}${deps ? ` <- ${deps}` : ""}`);
    for (const s of t.subtasks) {
      console.log(`    - ${s.id} ${s.name}`);
    }
  }
  if (outcome.usage) console.log("Usage:", outcome.usage);
  if (outcome.cost) console.log("Cost (美分):", outcome.cost.totalCents);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
