import type { Operator, Token } from "../types";

// Alternation order matters: parens, then whole-word operators, then bare terms
const TOKEN_PATTERN = /\(|\)|\b(?:AND|OR)\b|[^\s()]+/gi;

/**
 * Return the operator for a word, or null if the word is a plain term.
 * Comparison is case-insensitive.
 */
export function toOperator(word: string): Operator | null {
    const upper = word.toUpperCase();
    if (upper === "AND" || upper === "OR") {
        return upper;
    }
    return null;
}

/**
 * Split a boolean query into parens, operators and terms.
 * Terms keep their original case; operators are normalized to upper case.
 */
export function tokenize(query: string): Token[] {
    const tokens: Token[] = [];

    for (const match of query.matchAll(TOKEN_PATTERN)) {
        const text = match[0];
        if (text === "(") {
            tokens.push({ kind: "open" });
            continue;
        }
        if (text === ")") {
            tokens.push({ kind: "close" });
            continue;
        }
        const operator = toOperator(text);
        tokens.push(operator !== null ? { kind: "operator", operator } : { kind: "term", text });
    }

    return tokens;
}

/**
 * Render a token back to its query text
 */
export function tokenText(token: Token): string {
    switch (token.kind) {
        case "open":
            return "(";
        case "close":
            return ")";
        case "operator":
            return token.operator;
        case "term":
            return token.text;
    }
}
