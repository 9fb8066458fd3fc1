/**
 * 多模态抽取：把收据图片以 data URI 附件发送，抽取明细并校验小计 = Σ price × quantity。
 * 用法：tsx stages/stage-3-extraction/examples/receipt-image.ts ./receipt.jpg
 */

import { readFile } from "node:fs/promises";

import {
  buildProviderConfigFromModelMaps,
  createConsoleLogger,
  createModelGateway,
  getDefaultModelFromMaps,
  loadGlobalConfig,
  toDataUri,
} from "../../stage-0-model-gateway/src/index.js";
import {
  arrayOf,
  defineSchema,
  defineShape,
  enumOf,
  integer,
  number,
  string,
} from "../../stage-1-schema/src/index.js";
import { aggregateEquals } from "../../stage-2-output-control/src/index.js";
import { createGatewayInvoker, extract } from "../src/index.js";

const schema = defineSchema(
  defineShape({
    name: "receipt",
    fields: [
      string("merchant"),
      enumOf("currency", ["USD", "EUR", "CNY"], { required: false }),
      arrayOf(
        "items",
        defineShape({
          name: "item",
          fields: [
            string("name"),
            number("price", { minimum: 0, description: "Unit price" }),
            integer("quantity", { minimum: 1 }),
          ],
        }),
        { minItems: 1 }
      ),
      number("subtotal"),
      number("total"),
    ],
    rules: [
      aggregateEquals({
        collection: "items",
        multiply: ["price", "quantity"],
        target: "subtotal",
      }),
    ],
  })
);

async function main() {
  const imagePath = process.argv[2];
  if (!imagePath) {
    throw new Error("Usage: receipt-image.ts <image.jpg|image.png>");
  }
  const mimeType = imagePath.toLowerCase().endsWith(".png") ? "image/png" : "image/jpeg";
  const config = loadGlobalConfig();

  const gateway = createModelGateway({
    providers: buildProviderConfigFromModelMaps(),
    defaultModel: getDefaultModelFromMaps(),
    logger: createConsoleLogger("error"),
  });

  const outcome = await extract(
    schema,
    {
      text: "Extract the merchant, every line item, the subtotal and the total from this receipt.",
      attachments: [toDataUri(await readFile(imagePath), mimeType)],
    },
    {
      invokeModel: createGatewayInvoker(gateway),
      maxRetries: config.maxRetries,
      attemptTimeoutMs: config.attemptTimeoutMs,
    }
  );

  if (outcome.success) {
    console.log(JSON.stringify(outcome.data, null, 2));
  } else {
    console.log(outcome.error.report());
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
