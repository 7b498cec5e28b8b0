/**
 * Error types raised by the optimizer
 */

export type OracleErrorKind =
    | "timeout"     // Request exceeded its time budget
    | "transport"   // Network failure or non-2xx response
    | "parse";      // Response had no readable result count

/** The query text cannot be optimized (e.g. no search terms at all) */
export class QueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "QueryError";
    }
}

/** A configuration value is missing or malformed */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * A result-count oracle failed to measure a query.
 * Always names the query that was being measured.
 */
export class OracleError extends Error {
    readonly kind: OracleErrorKind;
    readonly query: string;

    constructor(kind: OracleErrorKind, query: string, message: string, options?: { cause?: unknown }) {
        super(`${message} (query: "${query}")`, options);
        this.name = "OracleError";
        this.kind = kind;
        this.query = query;
    }

    /** Timeouts and transport failures may succeed on another attempt */
    get retryable(): boolean {
        return this.kind !== "parse";
    }
}

/**
 * Attribute an arbitrary failure to the query being measured.
 * OracleErrors pass through unchanged.
 */
export function toOracleError(error: unknown, query: string): OracleError {
    if (error instanceof OracleError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new OracleError("transport", query, message, { cause: error });
}
