import type { CostEstimate, CostTable, Usage } from "./types.js";

const round2 = (x: number) => Math.round(x * 100) / 100;

export function estimateCost(
  usage: Usage | undefined,
  model: string,
  costTable: CostTable
): CostEstimate | undefined {
  if (!usage) {
    return undefined;
  }

  const entry = costTable[model];
  if (!entry) {
    return undefined;
  }

  const inputCents = round2((usage.inputTokens / 1000) * entry.inputCentsPer1k);
  const outputCents = round2(
    (usage.outputTokens / 1000) * entry.outputCentsPer1k
  );

  return {
    inputCents,
    outputCents,
    totalCents: round2(inputCents + outputCents),
    currency: entry.currency ?? "USD",
  };
}

/** Sum estimates across calls; undefined entries (unknown model) are skipped. */
export function sumCosts(
  costs: Array<CostEstimate | undefined>
): CostEstimate | undefined {
  const known = costs.filter((c): c is CostEstimate => c !== undefined);
  if (known.length === 0) {
    return undefined;
  }
  const inputCents = round2(known.reduce((sum, c) => sum + c.inputCents, 0));
  const outputCents = round2(known.reduce((sum, c) => sum + c.outputCents, 0));
  return {
    inputCents,
    outputCents,
    totalCents: round2(inputCents + outputCents),
    currency: "USD",
  };
}

export function createDefaultCostTable(): CostTable {
  return {
    "gpt-4o": { inputCentsPer1k: 0.25, outputCentsPer1k: 1.0 },
    "gpt-4o-mini": { inputCentsPer1k: 0.015, outputCentsPer1k: 0.06 },
    "gpt-4.1-mini": { inputCentsPer1k: 0.04, outputCentsPer1k: 0.16 },
    "gemini-2.5-flash": { inputCentsPer1k: 0.03, outputCentsPer1k: 0.25 },
    "gemini-2.0-flash": { inputCentsPer1k: 0.01, outputCentsPer1k: 0.04 },
    "glm-4.7": { inputCentsPer1k: 0.15, outputCentsPer1k: 0.15 },
    "glm-4-flash": { inputCentsPer1k: 0.05, outputCentsPer1k: 0.15 },
    "glm-4v-plus": { inputCentsPer1k: 0.2, outputCentsPer1k: 0.2 },
    "deepseek-chat": { inputCentsPer1k: 0.027, outputCentsPer1k: 0.11 },
    "deepseek-reasoner": { inputCentsPer1k: 0.055, outputCentsPer1k: 0.219 },
  };
}
