/**
 * Prompt Compiler: schema + instructions (+ prior failure) -> model request.
 * Pure: the same inputs always compile to the same messages.
 */

import type {
  ContentPart,
  Message,
} from "../../stage-0-model-gateway/src/types.js";
import {
  describeSchema,
  toJsonSchema,
  type SchemaDescriptor,
  type Violation,
} from "../../stage-1-schema/src/index.js";
import {
  formatViolation,
  isIdentityCollision,
} from "../../stage-2-output-control/src/index.js";
import type { Instructions, ModelRequest } from "./types.js";

export const EXTRACTION_PREAMBLE =
  "You are a data extraction engine. Read the user's input and answer with structured data that follows the schema below.";

export interface RetryContext {
  /** Raw text of the previous model answer. */
  priorResponse: string;
  violations: Violation[];
}

export interface CompileOptions {
  model?: string;
}

function outputDirective(schema: SchemaDescriptor): string {
  const lines = [
    "Output format:",
    "- Respond with exactly one JSON object that conforms to the JSON Schema above.",
    "- Do not wrap it in markdown and do not add any text before or after it.",
    "- Leave out optional fields you have no value for; never invent values.",
  ];
  if (Object.keys(schema.idSpaces).length > 0) {
    lines.push(
      "- Every id must be unique within its id space, across all shapes sharing it.",
      "- Every reference must hold the id of a node present in your answer."
    );
  }
  return lines.join("\n");
}

export function compileSystemPrompt(schema: SchemaDescriptor): string {
  return [
    EXTRACTION_PREAMBLE,
    describeSchema(schema),
    `JSON Schema:\n${JSON.stringify(toJsonSchema(schema), null, 2)}`,
    outputDirective(schema),
  ].join("\n\n");
}

function userContent(instructions: Instructions): string | ContentPart[] {
  if (typeof instructions === "string") {
    return instructions;
  }
  const attachments = instructions.attachments ?? [];
  if (attachments.length === 0) {
    return instructions.text;
  }
  return [
    { type: "text", text: instructions.text },
    ...attachments.map((dataUri): ContentPart => ({ type: "image", dataUri })),
  ];
}

export function compileCorrection(violations: Violation[]): string {
  const lines = [
    "Your previous answer did not pass validation. Problems found:",
    ...violations.map(formatViolation),
    "",
    "Correct exactly the fields listed above and keep every other field as it was.",
  ];
  if (violations.some(isIdentityCollision)) {
    lines.push(
      "Give each colliding node its own distinct id and update any references that pointed at it."
    );
  }
  lines.push("Return the complete corrected JSON object, not only the changed fields.");
  return lines.join("\n");
}

export function compileRequest(
  schema: SchemaDescriptor,
  instructions: Instructions,
  retry?: RetryContext,
  options: CompileOptions = {}
): ModelRequest {
  const messages: Message[] = [
    { role: "system", content: compileSystemPrompt(schema) },
    { role: "user", content: userContent(instructions) },
  ];
  if (retry) {
    messages.push(
      { role: "assistant", content: retry.priorResponse },
      { role: "user", content: compileCorrection(retry.violations) }
    );
  }
  return {
    model: options.model,
    messages,
    responseFormat: "json",
    schemaName: schema.name,
  };
}
