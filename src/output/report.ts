import type { OptimizationReport, PreparedQuery } from "../pipeline";
import { tokenText } from "../preprocessing/tokenize";
import { describeNode } from "../utils/shared";

/**
 * Format an optimization run for display
 */
export function formatReport(report: OptimizationReport): string {
    const lines: string[] = [];

    lines.push("--- Final Results ---");
    lines.push(`Result Count: ${report.baselineCount}`);
    lines.push("");
    lines.push("Final Search Query:");
    lines.push(report.finalQuery);
    lines.push("");
    lines.push("Excluded Keywords:");
    if (report.excludedTerms.length === 0) {
        lines.push("(none)");
    } else {
        lines.push(...report.excludedTerms);
    }

    return lines.join("\n");
}

/**
 * Machine-readable form of an optimization run
 */
export function reportToJson(report: OptimizationReport): string {
    return JSON.stringify(
        {
            originalQuery: report.originalQuery,
            searchQuery: report.searchQuery,
            backend: report.backend,
            baselineCount: report.baselineCount,
            finalQuery: report.finalQuery,
            excludedTerms: report.excludedTerms,
            steps: report.steps,
        },
        null,
        2
    );
}

/**
 * Format the parsing stages of a query (dry run, no oracle calls)
 */
export function formatAnalysis(prepared: PreparedQuery): string {
    const lines: string[] = [];

    lines.push(`Tokens: ${prepared.tokens.map(tokenText).join(" ")}`);
    if (prepared.droppedTokens.length > 0) {
        lines.push(`Dropped after unmatched ")": ${prepared.droppedTokens.map(tokenText).join(" ")}`);
    }
    lines.push(`Tree: ${describeNode(prepared.tree)}`);
    lines.push("Minimal groups:");
    for (const group of prepared.minimalGroups) {
        lines.push(`  ${describeNode(group)}`);
    }
    lines.push(`Flattened: ${describeNode(prepared.flattened)}`);
    lines.push(`Search query: ${prepared.searchQuery}`);
    lines.push("OR keywords:");
    for (const entry of prepared.orKeywords) {
        lines.push(`  ${entry.term}${entry.position !== undefined ? ` [${entry.position}]` : ""}`);
    }

    return lines.join("\n");
}
