import type { OptimizerConfig } from "../config";
import { createEutilsOracle } from "./eutils";
import { createPubmedHtmlOracle } from "./pubmed-html";
import { withRetry } from "./retry";
import type { ResultCountOracle } from "./types";

export type { ResultCountOracle, OracleBackend } from "./types";

/**
 * Build the configured oracle backend, wrapped with retry when enabled
 */
export function createOracle(config: OptimizerConfig): ResultCountOracle {
    const base = config.backend === "html"
        ? createPubmedHtmlOracle({ baseUrl: config.pubmedUrl, timeout: config.timeout })
        : createEutilsOracle({ baseUrl: config.eutilsUrl, timeout: config.timeout, apiKey: config.apiKey });

    if (config.retries === 0) {
        return base;
    }
    return withRetry(base, { retries: config.retries, backoffMs: config.backoffMs });
}
