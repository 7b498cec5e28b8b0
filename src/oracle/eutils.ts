/**
 * NCBI E-utilities result-count client
 */

import { z } from "zod";
import { OracleError } from "../errors";
import { withTrailingSlash } from "../utils/shared";
import { DEFAULT_TIMEOUT, fetchText } from "./http";
import type { EutilsOracleOptions, ResultCountOracle } from "./types";

const esearchSchema = z.object({
    esearchresult: z.object({
        count: z.string().regex(/^\d+$/).optional(),
        ERROR: z.string().optional(),
    }),
});

/**
 * Pull the result count out of an esearch JSON body
 */
export function parseEsearchCount(body: string, query: string): number {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        throw new OracleError("parse", query, "E-utilities returned invalid JSON", { cause: error });
    }

    const parsed = esearchSchema.safeParse(json);
    if (!parsed.success) {
        throw new OracleError("parse", query, "E-utilities response has no esearchresult", { cause: parsed.error });
    }

    const { count, ERROR: serviceError } = parsed.data.esearchresult;
    if (serviceError !== undefined) {
        throw new OracleError("parse", query, `E-utilities rejected the query: ${serviceError}`);
    }
    if (count === undefined) {
        throw new OracleError("parse", query, "E-utilities response has no count");
    }

    return parseInt(count, 10);
}

/**
 * Build an oracle backed by esearch with rettype=count
 */
export function createEutilsOracle(options: EutilsOracleOptions): ResultCountOracle {
    const { baseUrl, apiKey, timeout = DEFAULT_TIMEOUT, userAgent } = options;

    return {
        name: "eutils",
        async count(query: string, signal?: AbortSignal): Promise<number> {
            const url = new URL("esearch.fcgi", withTrailingSlash(baseUrl));
            url.searchParams.set("db", "pubmed");
            url.searchParams.set("term", query);
            url.searchParams.set("rettype", "count");
            url.searchParams.set("retmode", "json");
            if (apiKey) {
                url.searchParams.set("api_key", apiKey);
            }

            const body = await fetchText(url, query, {
                timeout,
                accept: "application/json",
                userAgent,
                signal,
            });
            return parseEsearchCount(body, query);
        },
    };
}
