import type { GroupNode, QueryNode } from "../types";
import type { ResultCountOracle } from "../oracle/types";
import { toOperator } from "../preprocessing/tokenize";

export type NodeSpec = string | NodeSpec[];

function buildNode(spec: NodeSpec): QueryNode {
    if (Array.isArray(spec)) {
        return build(spec);
    }
    const operator = toOperator(spec);
    return operator !== null ? { kind: "operator", operator } : { kind: "term", text: spec };
}

/**
 * Build a group from nested arrays: "AND"/"OR" become operators,
 * other strings terms, arrays nested groups
 */
export function build(specs: NodeSpec[]): GroupNode {
    return { kind: "group", children: specs.map(buildNode) };
}

export function term(text: string): QueryNode {
    return { kind: "term", text };
}

export interface RecordingOracle extends ResultCountOracle {
    calls: string[];
}

/**
 * Oracle answering from a count function and recording every query it sees
 */
export function recordingOracle(countFor: (query: string) => number): RecordingOracle {
    const calls: string[] = [];
    return {
        name: "scripted",
        calls,
        async count(query: string): Promise<number> {
            calls.push(query);
            return countFor(query);
        },
    };
}

/**
 * Oracle answering from a fixed table; unknown queries fail the test
 */
export function scriptedOracle(counts: Record<string, number>): RecordingOracle {
    return recordingOracle((query) => {
        const count = counts[query];
        if (count === undefined) {
            throw new Error(`Unscripted query: ${query}`);
        }
        return count;
    });
}
