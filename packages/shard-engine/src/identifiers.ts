/**
 * A device or account identifier: a non-negative integer in decimal form, kept as a string so
 * values wider than `Number.MAX_SAFE_INTEGER` survive unchanged.
 */
export type Identifier = string;

const stripLeadingZeros = (id: Identifier): string => {
  let start = 0;
  while (start < id.length - 1 && id[start] === "0") {
    start += 1;
  }
  return id.slice(start);
};

/**
 * Orders identifiers by numeric value. Identifiers with the same numeric value ("7" and "007")
 * fall back to plain string order so the ordering stays total.
 */
export function compareIdentifiers(a: Identifier, b: Identifier): number {
  const left = stripLeadingZeros(a);
  const right = stripLeadingZeros(b);

  if (left.length !== right.length) {
    return left.length - right.length;
  }
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function sortIdentifiers(ids: readonly Identifier[]): Identifier[] {
  return [...ids].sort(compareIdentifiers);
}
