import type { GroupNode, QueryNode } from "../types";

/**
 * Check whether a node contains an AND/OR operator at any depth
 */
export function containsOperator(node: QueryNode): boolean {
    switch (node.kind) {
        case "operator":
            return true;
        case "term":
            return false;
        case "group":
            return node.children.some(containsOperator);
    }
}

/**
 * Collect the smallest operator-bearing groups of a query tree.
 *
 * A group is minimal when it holds an operator but none of its direct child
 * groups does. Groups come out depth-first, left to right, so nested spans
 * always precede the ancestors that enclose them.
 */
export function extractMinimalGroups(tree: GroupNode): GroupNode[] {
    if (!containsOperator(tree)) {
        return [];
    }

    const minimalGroups: GroupNode[] = [];
    let childHasOperator = false;

    for (const child of tree.children) {
        if (child.kind === "group" && containsOperator(child)) {
            childHasOperator = true;
            minimalGroups.push(...extractMinimalGroups(child));
        }
    }

    if (!childHasOperator) {
        minimalGroups.push(tree);
    }

    return minimalGroups;
}
