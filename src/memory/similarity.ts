/**
 * Token-set similarity used to match findings and objectives.
 */

const STOP_WORDS = new Set([
    "a", "an", "the", "of", "to", "and", "or", "in", "on", "for", "is", "it", "by", "with", "as", "at", "this", "that",
]);

/** Lowercased word tokens, without stop words and bare numbers. */
export function tokenize(text: string): Set<string> {
    const tokens = new Set<string>();
    for (const token of text.toLowerCase().split(/[^a-z0-9_]+/)) {
        if (token.length === 0 || STOP_WORDS.has(token) || /^\d+$/.test(token)) continue;
        tokens.add(token);
    }
    return tokens;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 || b.size === 0) return 0;
    let shared = 0;
    for (const token of a) {
        if (b.has(token)) shared++;
    }
    return shared / (a.size + b.size - shared);
}

export function textSimilarity(a: string, b: string): number {
    return jaccard(tokenize(a), tokenize(b));
}

/** 1 for the same objective, token overlap otherwise. */
export function objectiveRelevance(query: string, objective: string): number {
    if (query.trim().toLowerCase() === objective.trim().toLowerCase()) return 1;
    return textSimilarity(query, objective);
}

/**
 * The first sentence of an insight: what was tried and what it showed,
 * without the comparison notes that follow.
 */
export function findingStatement(insight: string): string {
    const end = /\.(\s|$)/.exec(insight);
    return end ? insight.slice(0, end.index) : insight;
}
