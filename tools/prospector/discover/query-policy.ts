export interface QueryPolicyInput {
  queries: string[];
  maxQueries: number;
}

export interface QueryPolicyResult {
  queries: string[];
  duplicateCount: number;
  droppedCount: number;
  duplicateRatio: number;
}

/**
 * Trims, drops blank and near-duplicate queries (same tokens in any order or
 * case), then keeps at most `maxQueries` of them in their original order.
 */
export function applyQueryPolicy(input: QueryPolicyInput): QueryPolicyResult {
  const normalizedSeen = new Set<string>();
  const output: string[] = [];
  let duplicateCount = 0;
  let droppedCount = 0;

  for (const query of input.queries) {
    const normalized = normalizeQuery(query);
    if (!normalized) {
      droppedCount += 1;
      continue;
    }
    if (normalizedSeen.has(normalized)) {
      duplicateCount += 1;
      continue;
    }
    normalizedSeen.add(normalized);
    if (output.length >= input.maxQueries) {
      droppedCount += 1;
      continue;
    }
    output.push(query.trim());
  }

  const total = Math.max(1, output.length + duplicateCount);
  return {
    queries: output,
    duplicateCount,
    droppedCount,
    duplicateRatio: duplicateCount / total,
  };
}

export function normalizeQuery(query: string): string {
  return query
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean)
    .sort()
    .join(" ");
}
