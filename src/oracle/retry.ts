import { toOracleError } from "../errors";
import { sleep } from "../utils/shared";
import Logger from "../utils/logger";
import type { ResultCountOracle, RetryOptions } from "./types";

const logger = Logger.getInstance();

/**
 * Wrap an oracle so timeouts and transport failures are retried with linear
 * backoff. Parse errors and caller aborts are rethrown immediately.
 */
export function withRetry(oracle: ResultCountOracle, options: RetryOptions): ResultCountOracle {
    const { retries, backoffMs } = options;

    return {
        name: oracle.name,
        async count(query: string, signal?: AbortSignal): Promise<number> {
            let attempt = 0;
            for (;;) {
                try {
                    return await oracle.count(query, signal);
                } catch (error) {
                    if (signal?.aborted) {
                        throw error;
                    }
                    const oracleError = toOracleError(error, query);
                    if (!oracleError.retryable || attempt >= retries) {
                        throw oracleError;
                    }
                    attempt++;
                    logger.warn(`${oracle.name}: ${oracleError.message}; retry ${attempt}/${retries} in ${attempt * backoffMs}ms`);
                    await sleep(attempt * backoffMs, signal);
                }
            }
        },
    };
}
