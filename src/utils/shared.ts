/**
 * Shared utility functions used across the codebase
 */

import type { LeafNode, QueryNode } from "../types";

// =============================================================================
// Node utilities
// =============================================================================

/** Text of a term, or the canonical spelling of an operator */
export function leafText(node: LeafNode): string {
    return node.kind === "term" ? node.text : node.operator;
}

/**
 * Render a node as plain bracketed text, for logs and dry-run output.
 * Unlike the reconstructor this adds no parentheses around terms.
 */
export function describeNode(node: QueryNode): string {
    if (node.kind !== "group") {
        return leafText(node);
    }
    return `[${node.children.map(describeNode).join(", ")}]`;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/**
 * Ensure a base URL ends with "/" so relative paths resolve under it
 */
export function withTrailingSlash(url: string): string {
    return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Remove the first occurrence of `needle` from `haystack`.
 * Returns null when `needle` does not occur.
 */
export function removeFirst(haystack: string, needle: string): string | null {
    const index = haystack.indexOf(needle);
    if (index === -1) return null;
    return haystack.slice(0, index) + haystack.slice(index + needle.length);
}

// =============================================================================
// Async utilities
// =============================================================================

/**
 * Resolve after `ms` milliseconds, or reject early if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timeoutId);
            reject(signal?.reason);
        };
        const timeoutId = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}
