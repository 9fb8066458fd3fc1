import { describe, expect, it } from "vitest";

import {
  contentToText,
  countAttachments,
  parseDataUri,
  toDataUri,
} from "../attachments.js";
import { estimateCost, sumCosts } from "../cost.js";
import { toGeminiContents } from "../providers/google.js";

describe("data URIs", () => {
  it("encodes bytes and reads them back", () => {
    const uri = toDataUri(new Uint8Array([1, 2, 3]), "image/png");
    expect(uri).toBe("data:image/png;base64,AQID");
    expect(parseDataUri(uri)).toEqual({ mimeType: "image/png", base64: "AQID" });
  });

  it("rejects anything that is not a base64 data URI", () => {
    expect(() => parseDataUri("https://example.com/a.png")).toThrow(
      "Not a base64 data URI: https://example.com/a.png"
    );
  });

  it("counts image parts and flattens text", () => {
    const messages = [
      { role: "system" as const, content: "rules" },
      {
        role: "user" as const,
        content: [
          { type: "text" as const, text: "look" },
          { type: "image" as const, dataUri: "data:image/jpeg;base64,AAAA" },
        ],
      },
    ];
    expect(countAttachments(messages)).toBe(1);
    expect(contentToText(messages[1].content)).toBe("look");
  });
});

describe("toGeminiContents", () => {
  it("maps assistant turns to the model role and images to inline data", () => {
    const { system, contents } = toGeminiContents([
      { role: "system", content: "rules" },
      {
        role: "user",
        content: [
          { type: "text", text: "look" },
          { type: "image", dataUri: "data:image/jpeg;base64,AAAA" },
        ],
      },
      { role: "assistant", content: "{}" },
      { role: "user", content: "fix it" },
    ]);
    expect(system).toBe("rules");
    expect(contents).toEqual([
      {
        role: "user",
        parts: [{ text: "look" }, { inlineData: { mimeType: "image/jpeg", data: "AAAA" } }],
      },
      { role: "model", parts: [{ text: "{}" }] },
      { role: "user", parts: [{ text: "fix it" }] },
    ]);
  });
});

describe("cost", () => {
  const table = { "test-model": { inputCentsPer1k: 1, outputCentsPer1k: 2 } };

  it("estimates from usage and skips unknown models", () => {
    const usage = { inputTokens: 500, outputTokens: 250, totalTokens: 750 };
    expect(estimateCost(usage, "test-model", table)).toEqual({
      inputCents: 0.5,
      outputCents: 0.5,
      totalCents: 1,
      currency: "USD",
    });
    expect(estimateCost(usage, "other", table)).toBeUndefined();
  });

  it("sums known estimates", () => {
    const one = { inputCents: 0.5, outputCents: 0.5, totalCents: 1, currency: "USD" as const };
    expect(sumCosts([one, undefined, one])).toEqual({
      inputCents: 1,
      outputCents: 1,
      totalCents: 2,
      currency: "USD",
    });
    expect(sumCosts([undefined])).toBeUndefined();
  });
});
