import type { EliminationResult, EliminationStep, OrKeywordEntry } from "../types";
import type { ResultCountOracle } from "../oracle/types";
import { toOracleError } from "../errors";
import { removalText } from "../extraction/keywords";
import { removeFirst, truncateText } from "../utils/shared";
import Logger from "../utils/logger";

export interface EliminationOptions {
    /** Checked before every oracle call; aborting stops the run between calls */
    signal?: AbortSignal | undefined;
    /** Called after each tagged term has been tried */
    onStep?: ((step: EliminationStep) => void) | undefined;
}

async function measure(
    oracle: ResultCountOracle,
    query: string,
    signal: AbortSignal | undefined
): Promise<number> {
    signal?.throwIfAborted();
    try {
        return await oracle.count(query, signal);
    } catch (error) {
        if (signal?.aborted) {
            throw error;
        }
        throw toOracleError(error, query);
    }
}

/**
 * Greedily drop terms that do not change the result count.
 *
 * The baseline query is measured once. Each tagged term is then cut from the
 * current query (first occurrence of its removal text) and the candidate is
 * measured; when the count still equals the baseline the cut is kept. Calls
 * are strictly sequential because every candidate builds on the previous
 * outcome, so the result depends on term order and is only locally minimal.
 *
 * A term whose removal text no longer occurs in the current query is skipped
 * without an oracle call and is not excluded. Any oracle failure aborts the
 * run with an OracleError naming the query being measured.
 */
export async function eliminateRedundantTerms(
    baselineQuery: string,
    taggedTerms: readonly OrKeywordEntry[],
    oracle: ResultCountOracle,
    options: EliminationOptions = {}
): Promise<EliminationResult> {
    const { signal, onStep } = options;
    const logger = Logger.getInstance();

    const baselineCount = await measure(oracle, baselineQuery, signal);
    logger.debug(`Baseline: ${baselineCount} results for ${truncateText(baselineQuery, 200)}`);

    let currentQuery = baselineQuery;
    const excludedTerms: string[] = [];
    const steps: EliminationStep[] = [];

    for (const entry of taggedTerms) {
        const removed = removalText(entry);
        const candidate = removeFirst(currentQuery, removed);

        let step: EliminationStep;
        if (candidate === null) {
            logger.debug(`Skipped "${entry.term}": "${removed}" not in current query`);
            step = {
                term: entry.term,
                removed,
                found: false,
                candidateQuery: currentQuery,
                count: null,
                redundant: false,
            };
        } else {
            const count = await measure(oracle, candidate, signal);
            const redundant = count === baselineCount;
            if (redundant) {
                excludedTerms.push(entry.term);
                currentQuery = candidate;
            }
            logger.debug(`${redundant ? "Dropped" : "Kept"} "${entry.term}": ${count} results without it`);
            step = {
                term: entry.term,
                removed,
                found: true,
                candidateQuery: candidate,
                count,
                redundant,
            };
        }

        steps.push(step);
        onStep?.(step);
    }

    return { baselineCount, finalQuery: currentQuery, excludedTerms, steps };
}
