import type { DistributionContext } from "./types.js";

export const range = (from: number, to: number): string[] =>
  Array.from({ length: to - from + 1 }, (_, i) => String(from + i));

export const contextFor = (
  pool: readonly string[],
  overrides: Partial<DistributionContext> = {},
): DistributionContext => ({
  pool,
  filteredTotal: pool.length,
  reservedCountByShard: new Map(),
  seed: "",
  ...overrides,
});
