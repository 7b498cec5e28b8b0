import type { FlattenedGroup, OrKeywordEntry } from "../types";

function collectTerms(structure: FlattenedGroup, terms: string[]): void {
    switch (structure.kind) {
        case "operator":
            return;
        case "term":
            terms.push(structure.text);
            return;
        case "group":
            for (const child of structure.children) {
                collectTerms(child, terms);
            }
    }
}

/**
 * List the terms of a flattened structure, left to right, with the side the
 * " OR " separator is expected on in the reconstructed query.
 *
 * With several terms the first is tagged "after" and the rest "before";
 * a lone term gets no hint.
 */
export function tagOrKeywords(structure: FlattenedGroup): OrKeywordEntry[] {
    const terms: string[] = [];
    collectTerms(structure, terms);

    if (terms.length === 1) {
        return terms.map(term => ({ term }));
    }

    return terms.map((term, index): OrKeywordEntry => ({
        term,
        position: index === 0 ? "after" : "before",
    }));
}

/**
 * Literal substring to cut from the query to drop this term
 */
export function removalText(entry: OrKeywordEntry): string {
    switch (entry.position) {
        case "before":
            return ` OR (${entry.term})`;
        case "after":
            return `(${entry.term}) OR `;
        case undefined:
        default:
            return `(${entry.term})`;
    }
}
