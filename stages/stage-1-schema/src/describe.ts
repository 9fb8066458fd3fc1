/**
 * Render a Schema Descriptor as plain text for the model.
 * Pure: the same descriptor always yields the same text, which keeps retry prompts stable.
 */

import type {
  FieldKind,
  FieldSpec,
  ScalarKind,
  SchemaDescriptor,
  Shape,
  ShapeDocument,
} from "./types.js";

function scalarConstraints(kind: ScalarKind): string[] {
  const out: string[] = [];
  if (kind.minimum !== undefined) out.push(`minimum ${kind.minimum}`);
  if (kind.maximum !== undefined) out.push(`maximum ${kind.maximum}`);
  if (kind.minLength !== undefined) out.push(`at least ${kind.minLength} characters`);
  if (kind.maxLength !== undefined) out.push(`at most ${kind.maxLength} characters`);
  return out;
}

export function renderKind(kind: FieldKind): string {
  switch (kind.type) {
    case "scalar": {
      const constraints = scalarConstraints(kind);
      return constraints.length > 0
        ? `${kind.scalar} (${constraints.join(", ")})`
        : kind.scalar;
    }
    case "enum":
      return "enum";
    case "array":
      return `array of ${renderKind(kind.element)}`;
    case "embedded":
      return `object "${kind.shape().name}"`;
    case "id":
      return `id in space "${kind.space}"`;
    case "ref":
      return `reference to space "${kind.space}"`;
  }
}

function fieldFlags(spec: FieldSpec): string {
  const flags = [spec.required ? "required" : "optional"];
  if (spec.kind.type === "array") {
    if (spec.kind.minItems !== undefined) flags.push(`at least ${spec.kind.minItems} items`);
    if (spec.kind.maxItems !== undefined) flags.push(`at most ${spec.kind.maxItems} items`);
  }
  return flags.join(", ");
}

function enumLines(kind: FieldKind): string[] {
  const target = kind.type === "array" ? kind.element : kind;
  if (target.type !== "enum") {
    return [];
  }
  return target.values.map((v) =>
    v.meaning ? `    - "${v.value}": ${v.meaning}` : `    - "${v.value}"`
  );
}

function renderField(spec: FieldSpec): string[] {
  const head = `- ${spec.name} (${renderKind(spec.kind)}, ${fieldFlags(spec)})`;
  const lines = [spec.description ? `${head}: ${spec.description}` : head];
  const choices = enumLines(spec.kind);
  if (choices.length > 0) {
    lines.push("  one of:", ...choices);
  }
  return lines;
}

function renderDocument(document: ShapeDocument): string[] {
  return [`Document (v${document.version}):`, document.text];
}

function renderShape(shape: Shape): string[] {
  const head = `Shape "${shape.name}"`;
  const lines = [shape.description ? `${head}: ${shape.description}` : head];
  if (shape.document) {
    lines.push(...renderDocument(shape.document));
  }
  lines.push("Fields:");
  for (const spec of shape.fields) {
    lines.push(...renderField(spec));
  }
  if (shape.rules.some((rule) => rule.description)) {
    lines.push("Rules:");
    for (const rule of shape.rules) {
      if (rule.description) {
        lines.push(`- ${rule.description}`);
      }
    }
  }
  return lines;
}

export function describeSchema(schema: SchemaDescriptor): string {
  const blocks: string[][] = [];

  const header = [`Schema "${schema.name}" (root shape "${schema.root.name}")`];
  if (schema.document) {
    header.push(...renderDocument(schema.document));
  }
  blocks.push(header);

  for (const shape of schema.shapes) {
    blocks.push(renderShape(shape));
  }

  const spaces = Object.keys(schema.idSpaces).sort();
  if (spaces.length > 0) {
    const lines = ["Shared id spaces:"];
    for (const space of spaces) {
      const members = schema.idSpaces[space].map((n) => `"${n}"`).join(", ");
      lines.push(
        `- "${space}": ${members}. Every id must be unique across all of these shapes; a reference to "${space}" holds one of these ids.`
      );
    }
    blocks.push(lines);
  }

  return blocks.map((lines) => lines.join("\n")).join("\n\n");
}
