export type Operator = "AND" | "OR";

export type Token =
    | { kind: "open" }
    | { kind: "close" }
    | { kind: "operator"; operator: Operator }
    | { kind: "term"; text: string };

export interface TermNode {
    kind: "term";
    text: string;
}

export interface OperatorNode {
    kind: "operator";
    operator: Operator;
}

export interface GroupNode {
    kind: "group";
    children: QueryNode[];
}

export type LeafNode = TermNode | OperatorNode;

export type QueryNode = LeafNode | GroupNode;

/**
 * Output of the flattener: a single joined term when the group was pure-AND
 * with no nested groups, otherwise a group whose children are flattened too.
 */
export type FlattenedGroup = QueryNode;

/** Which side of the term the " OR " separator sits on in the reconstructed query */
export type PositionHint = "before" | "after";

export interface OrKeywordEntry {
    term: string;
    position?: PositionHint;
}

export interface EliminationStep {
    term: string;
    /** Literal substring the engine tried to remove */
    removed: string;
    /** False when the substring was absent from the current query */
    found: boolean;
    candidateQuery: string;
    /** Oracle count for the candidate, null when no call was made */
    count: number | null;
    redundant: boolean;
}

export interface EliminationResult {
    baselineCount: number;
    finalQuery: string;
    excludedTerms: string[];
    steps: EliminationStep[];
}
