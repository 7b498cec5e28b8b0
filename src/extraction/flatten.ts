import type { FlattenedGroup, GroupNode, LeafNode, QueryNode } from "../types";
import { leafText } from "../utils/shared";

function isJoinable(children: QueryNode[]): children is LeafNode[] {
    return children.every(child =>
        child.kind === "term" || (child.kind === "operator" && child.operator !== "OR")
    );
}

/**
 * Flatten a node bottom-up.
 *
 * Children are flattened first. A group whose flattened children hold no OR
 * and no nested group collapses into a single term, its children joined by
 * one space. Anything else stays a group. Terms and operators pass through.
 */
export function flattenNode(node: QueryNode): FlattenedGroup {
    if (node.kind !== "group") {
        return node;
    }

    const children = node.children.map(flattenNode);

    if (isJoinable(children)) {
        return { kind: "term", text: children.map(leafText).join(" ") };
    }

    return { kind: "group", children };
}

/**
 * Flatten a list of minimal groups as one list, so the sequence itself is
 * subject to the same collapse rule as each group inside it
 */
export function flattenGroups(groups: readonly GroupNode[]): FlattenedGroup {
    return flattenNode({ kind: "group", children: [...groups] });
}
