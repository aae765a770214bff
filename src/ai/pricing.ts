/**
 * OpenAI list prices, USD per million tokens
 */

export interface ModelPrice {
  input: number;
  output: number;
}

export const MODEL_PRICES: Readonly<Record<string, ModelPrice>> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1': { input: 2, output: 8 },
};

const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Dated snapshots ("gpt-4o-mini-2024-07-18") are priced as their family
 */
export function priceFor(model: string): ModelPrice {
  const family = Object.keys(MODEL_PRICES)
    .filter((name) => model === name || model.startsWith(`${name}-`))
    .sort((a, b) => b.length - a.length)[0];
  return MODEL_PRICES[family ?? DEFAULT_MODEL] ?? { input: 0.15, output: 0.6 };
}

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number): number {
  const price = priceFor(model);
  const cost = (inputTokens * price.input + outputTokens * price.output) / 1_000_000;
  return Math.round(cost * 1e6) / 1e6;
}
