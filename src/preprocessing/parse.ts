import type { GroupNode, QueryNode, Token } from "../types";
import { tokenize } from "./tokenize";

export interface ParsedTokenStream {
    tree: GroupNode;
    /** Number of tokens consumed; anything past this was dropped */
    consumed: number;
}

interface GroupParse {
    group: GroupNode;
    next: number;
}

function parseGroup(tokens: readonly Token[], start: number): GroupParse {
    const children: QueryNode[] = [];
    let position = start;

    while (position < tokens.length) {
        const token = tokens[position];
        position++;
        if (token === undefined) break;

        switch (token.kind) {
            case "open": {
                const inner = parseGroup(tokens, position);
                children.push(inner.group);
                position = inner.next;
                break;
            }
            case "close":
                return { group: { kind: "group", children }, next: position };
            case "operator":
                children.push({ kind: "operator", operator: token.operator });
                break;
            case "term":
                children.push({ kind: "term", text: token.text });
                break;
        }
    }

    return { group: { kind: "group", children }, next: position };
}

/**
 * Build the query tree from a token sequence.
 *
 * Parenthesized spans become nested groups. An unclosed "(" ends at the end of
 * input. A ")" with no matching "(" ends the top-level group: tokens after it
 * are not part of the tree, and `consumed` tells the caller how far parsing got.
 */
export function parseTokenStream(tokens: readonly Token[]): ParsedTokenStream {
    const { group, next } = parseGroup(tokens, 0);
    return { tree: group, consumed: next };
}

export function parseTokens(tokens: readonly Token[]): GroupNode {
    return parseTokenStream(tokens).tree;
}

/**
 * Tokenize and parse a query in one step
 */
export function parseQuery(query: string): GroupNode {
    return parseTokens(tokenize(query));
}
