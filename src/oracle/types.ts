/**
 * Result-count oracle definitions
 */

/**
 * Reports how many results a search service returns for a query.
 * Implementations throw OracleError on any failure.
 */
export interface ResultCountOracle {
    readonly name: string;
    count(query: string, signal?: AbortSignal): Promise<number>;
}

export type OracleBackend = "eutils" | "html";

export interface HttpOracleOptions {
    baseUrl: string;
    /** Per-request timeout in ms */
    timeout?: number | undefined;
    userAgent?: string | undefined;
}

export interface EutilsOracleOptions extends HttpOracleOptions {
    /** NCBI API key, raises the E-utilities rate limit */
    apiKey?: string | undefined;
}

export interface RetryOptions {
    /** Extra attempts after the first failure */
    retries: number;
    /** Delay before attempt n is n * backoffMs */
    backoffMs: number;
}
