import { describe, expect, it } from "vitest";

import {
  arrayOf,
  defineSchema,
  defineShape,
  enumOf,
  idField,
  number,
  ref,
  refs,
  SchemaDefinitionError,
  string,
  type Shape,
} from "../index.js";

describe("defineShape", () => {
  it("makes fields required unless told otherwise", () => {
    const shape = defineShape({
      name: "contact",
      fields: [string("name"), string("email", { required: false })],
    });
    expect(shape.fields.map((f) => [f.name, f.required])).toEqual([
      ["name", true],
      ["email", false],
    ]);
  });

  it("rejects a field declared twice", () => {
    expect(() =>
      defineShape({ name: "a", fields: [string("x"), number("x")] })
    ).toThrow(new SchemaDefinitionError('Shape "a" declares "x" twice'));
  });

  it("rejects empty and repeated enum values", () => {
    expect(() =>
      defineShape({ name: "a", fields: [enumOf("e", [])] })
    ).toThrow("a.e: enum needs at least one value");
    expect(() =>
      defineShape({ name: "a", fields: [enumOf("e", ["x", { value: "x" }])] })
    ).toThrow('a.e: duplicate enum value "x"');
  });

  it("rejects a second id field", () => {
    expect(() =>
      defineShape({
        name: "a",
        fields: [idField("id", "s"), idField("key", "s")],
      })
    ).toThrow('Shape "a" declares two id fields ("id", "key")');
  });

  it("rejects inverted bounds and bad shape names", () => {
    expect(() =>
      defineShape({ name: "a", fields: [number("n", { minimum: 5, maximum: 1 })] })
    ).toThrow("a.n: value lower bound 5 exceeds upper bound 1");
    expect(() => defineShape({ name: "1st", fields: [] })).toThrow(
      SchemaDefinitionError
    );
  });

  it("returns a frozen descriptor", () => {
    const shape = defineShape({
      name: "line",
      fields: [enumOf("unit", ["kg", "pcs"])],
    });
    expect(Object.isFrozen(shape)).toBe(true);
    expect(Object.isFrozen(shape.fields)).toBe(true);
    expect(Object.isFrozen(shape.fields[0])).toBe(true);
  });
});

describe("defineSchema", () => {
  const subtask = defineShape({
    name: "subtask",
    fields: [idField("id", "work-item"), string("name")],
  });
  const ticket = defineShape({
    name: "ticket",
    fields: [
      idField("id", "work-item"),
      arrayOf("subtasks", subtask, { required: false }),
      refs("dependencies", "work-item", { required: false }),
    ],
  });

  it("collects shapes depth-first and groups shared id spaces", () => {
    const schema = defineSchema(
      defineShape({ name: "board", fields: [arrayOf("tickets", ticket)] })
    );
    expect(schema.name).toBe("board");
    expect(schema.shapes.map((s) => s.name)).toEqual(["board", "ticket", "subtask"]);
    expect(schema.idSpaces).toEqual({ "work-item": ["ticket", "subtask"] });
  });

  it("accepts self-referencing shapes", () => {
    const category: Shape = defineShape({
      name: "category",
      fields: [
        string("label"),
        arrayOf("children", () => category, { required: false }),
      ],
    });
    expect(defineSchema(category).shapes).toEqual([category]);
  });

  it("rejects references to a space no shape owns", () => {
    const note = defineShape({ name: "note", fields: [ref("about", "person")] });
    expect(() => defineSchema(note)).toThrow(
      'note.about references id space "person" but no shape declares an id in it'
    );
  });

  it("rejects two different shapes with one name", () => {
    const first = defineShape({ name: "item", fields: [string("a")] });
    const second = defineShape({ name: "item", fields: [string("b")] });
    const root = defineShape({
      name: "root",
      fields: [arrayOf("left", first), arrayOf("right", second)],
    });
    expect(() => defineSchema(root)).toThrow(
      'Two different shapes are both named "item"'
    );
  });
});
