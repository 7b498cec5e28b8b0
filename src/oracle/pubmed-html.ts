/**
 * PubMed search-page result-count client
 */

import * as cheerio from "cheerio";
import { OracleError } from "../errors";
import { normalizeWhitespace, withTrailingSlash } from "../utils/shared";
import { DEFAULT_TIMEOUT, fetchText } from "./http";
import type { HttpOracleOptions, ResultCountOracle } from "./types";

const RESULT_COUNT_SELECTOR = "div.results-amount > h3 > span.value";
const RESULTS_AMOUNT_SELECTOR = "div.results-amount";
const NO_RESULTS_PATTERN = /no results were found/i;

/**
 * Read the result count from a PubMed search results page.
 * Thousand separators are stripped; an explicit "no results" notice counts as 0.
 */
export function parseResultCount(html: string, query: string): number {
    const $ = cheerio.load(html);

    const valueText = $(RESULT_COUNT_SELECTOR).first().text().replace(/,/g, "").trim();
    if (/^\d+$/.test(valueText)) {
        return parseInt(valueText, 10);
    }

    const amountText = normalizeWhitespace($(RESULTS_AMOUNT_SELECTOR).first().text());
    if (NO_RESULTS_PATTERN.test(amountText)) {
        return 0;
    }

    const found = valueText === "" ? "nothing" : `"${valueText}"`;
    throw new OracleError("parse", query, `No result count on PubMed page (found ${found} at ${RESULT_COUNT_SELECTOR})`);
}

/**
 * Build an oracle that scrapes the PubMed results page for a query
 */
export function createPubmedHtmlOracle(options: HttpOracleOptions): ResultCountOracle {
    const { baseUrl, timeout = DEFAULT_TIMEOUT, userAgent } = options;

    return {
        name: "html",
        async count(query: string, signal?: AbortSignal): Promise<number> {
            const url = new URL(".", withTrailingSlash(baseUrl));
            url.searchParams.set("term", query);

            const html = await fetchText(url, query, {
                timeout,
                accept: "text/html,application/xhtml+xml",
                userAgent,
                signal,
            });
            return parseResultCount(html, query);
        },
    };
}
