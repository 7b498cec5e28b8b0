import type { FlattenedGroup } from "../types";

/**
 * Render a flattened structure back into a query string.
 *
 * Operators are emitted bare, every other term is wrapped as "(term)", and
 * nested groups are wrapped in parentheses. The outermost group is left
 * unwrapped: removal substrings are matched against this exact string.
 */
export function reconstructQuery(structure: FlattenedGroup, topLevel: boolean = true): string {
    switch (structure.kind) {
        case "operator":
            return structure.operator;
        case "term":
            return `(${structure.text})`;
        case "group": {
            const joined = structure.children
                .map(child => reconstructQuery(child, false))
                .join(" ");
            return topLevel ? joined : `(${joined})`;
        }
    }
}
