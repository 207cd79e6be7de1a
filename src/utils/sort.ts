/**
 * Code point order, the order the published files have always used
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Compare records field by field, first difference wins
 */
export function compareBy<T>(
  ...fields: ((item: T) => string)[]
): (a: T, b: T) => number {
  return (a, b) => {
    for (const field of fields) {
      const result = compareStrings(field(a), field(b));
      if (result !== 0) return result;
    }
    return 0;
  };
}
