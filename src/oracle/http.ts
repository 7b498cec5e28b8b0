/**
 * Fetch helper shared by the HTTP oracle backends
 */

import { OracleError } from "../errors";

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; PubmedQueryOptimizer/1.0)";
export const DEFAULT_TIMEOUT = 10000;

export interface FetchTextOptions {
    timeout: number;
    accept: string;
    userAgent?: string | undefined;
    signal?: AbortSignal | undefined;
}

/**
 * GET a URL and return its body text.
 *
 * The request is aborted after `timeout` ms (OracleError "timeout") or when
 * the caller's signal fires, in which case the signal's reason is rethrown.
 * Network failures and non-2xx responses become OracleError "transport".
 */
export async function fetchText(
    url: URL,
    query: string,
    options: FetchTextOptions
): Promise<string> {
    const { timeout, accept, userAgent = DEFAULT_USER_AGENT, signal } = options;

    signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
    }, timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
        const response = await fetch(url.toString(), {
            signal: controller.signal,
            headers: {
                "Accept": accept,
                "User-Agent": userAgent,
            },
        });

        if (!response.ok) {
            throw new OracleError("transport", query, `${url.hostname} returned ${response.status}: ${response.statusText}`);
        }

        return await response.text();
    } catch (error) {
        if (error instanceof OracleError) {
            throw error;
        }
        if (signal?.aborted) {
            throw signal.reason;
        }
        if (timedOut) {
            throw new OracleError("timeout", query, `Request to ${url.hostname} timed out after ${timeout}ms`, { cause: error });
        }
        const message = error instanceof Error ? error.message : "Unknown error";
        throw new OracleError("transport", query, `Request to ${url.hostname} failed: ${message}`, { cause: error });
    } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
    }
}
