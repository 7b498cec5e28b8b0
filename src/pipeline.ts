import type { EliminationResult, FlattenedGroup, GroupNode, OrKeywordEntry, Token } from "./types";
import { tokenize, tokenText } from "./preprocessing/tokenize";
import { parseTokenStream } from "./preprocessing/parse";
import { extractMinimalGroups } from "./extraction/groups";
import { flattenGroups } from "./extraction/flatten";
import { tagOrKeywords } from "./extraction/keywords";
import { reconstructQuery } from "./output/reconstruct";
import { eliminateRedundantTerms, type EliminationOptions } from "./optimizer/eliminate";
import { createOracle, type ResultCountOracle } from "./oracle";
import { loadConfig, type OptimizerConfig } from "./config";
import { QueryError } from "./errors";
import Logger from "./utils/logger";

export interface PreparedQuery {
    query: string;
    tokens: Token[];
    tree: GroupNode;
    /** Tokens lost after an unmatched ")" */
    droppedTokens: Token[];
    minimalGroups: GroupNode[];
    flattened: FlattenedGroup;
    /** Reconstructed query the oracle is asked about */
    searchQuery: string;
    orKeywords: OrKeywordEntry[];
}

export interface OptimizationReport extends EliminationResult {
    originalQuery: string;
    searchQuery: string;
    backend: string;
}

export interface OptimizeOptions extends EliminationOptions {
    config?: OptimizerConfig;
    /** Use this oracle instead of building one from config */
    oracle?: ResultCountOracle;
}

/**
 * Run the parsing stages: tokenize, parse, extract minimal groups, flatten,
 * reconstruct and tag. No network access.
 */
export function prepareQuery(query: string): PreparedQuery {
    const logger = Logger.getInstance();

    // Step 1: Tokenize
    const tokens = logger.time("1. Tokenize", () => tokenize(query));
    if (!tokens.some(token => token.kind === "term")) {
        throw new QueryError(`Query has no search terms: "${query}"`);
    }

    // Step 2: Parse into a tree
    const { tree, consumed } = logger.time("2. Parse tree", () => parseTokenStream(tokens));
    const droppedTokens = tokens.slice(consumed);
    if (droppedTokens.length > 0) {
        logger.warn(`Unmatched ")" in query; ignoring: ${droppedTokens.map(tokenText).join(" ")}`);
    }

    // Step 3: Minimal operator groups. A query without operators is optimized as a whole.
    const extracted = logger.time("3. Extract minimal groups", () => extractMinimalGroups(tree));
    const minimalGroups = extracted.length > 0 ? extracted : [tree];

    // Step 4: Flatten/join
    const flattened = logger.time("4. Flatten groups", () => flattenGroups(minimalGroups));

    // Step 5: Reconstruct
    const searchQuery = logger.time("5. Reconstruct query", () => reconstructQuery(flattened));

    // Step 6: Tag OR keywords
    const orKeywords = logger.time("6. Tag OR keywords", () => tagOrKeywords(flattened));

    return {
        query,
        tokens,
        tree,
        droppedTokens,
        minimalGroups,
        flattened,
        searchQuery,
        orKeywords,
    };
}

/**
 * Prepare a query and remove every term that does not change the result count
 */
export async function optimizeQuery(
    query: string,
    options: OptimizeOptions = {}
): Promise<OptimizationReport> {
    const logger = Logger.getInstance();
    const prepared = prepareQuery(query);
    const oracle = options.oracle ?? createOracle(options.config ?? loadConfig());

    logger.log(`Search query: ${prepared.searchQuery}`);
    logger.log(`Trying ${prepared.orKeywords.length} keyword(s) against ${oracle.name}`);

    // Step 7: Greedy elimination
    const result = await logger.timeAsync("7. Eliminate redundant terms", () =>
        eliminateRedundantTerms(prepared.searchQuery, prepared.orKeywords, oracle, {
            signal: options.signal,
            onStep: options.onStep,
        })
    );

    return {
        originalQuery: query,
        searchQuery: prepared.searchQuery,
        backend: oracle.name,
        ...result,
    };
}
