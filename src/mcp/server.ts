/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "../config";
import { optimizeQuery, prepareQuery } from "../pipeline";
import { formatAnalysis, formatReport } from "../output/report";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

function textResult(text: string, isError: boolean = false) {
    return {
        content: [
            {
                type: "text" as const,
                text,
            },
        ],
        ...(isError && { isError: true }),
    };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Build the MCP server with the optimizer tools registered
 */
export function createServer(): McpServer {
    const server = new McpServer({
        name: "pubmed_query_optimizer",
        version: "1.0.0",
    });

    server.tool(
        "optimize_pubmed_query",
        `Remove redundant keywords from a PubMed boolean query.

The query is split into its smallest AND/OR groups and rebuilt, then every OR keyword is removed in turn; a removal is kept when the PubMed result count stays the same. Each removal attempt is one PubMed request, so long queries take a while.

RETURNS: the result count, the reduced query and the excluded keywords.`,
        {
            query: z.string().describe("Boolean query using terms, AND, OR and parentheses"),
            backend: z.enum(["eutils", "html"]).optional().describe("Result-count backend (default: eutils)"),
            timeout: z.number().int().positive().optional().describe("Timeout in ms per PubMed request (default: 10000)"),
        },
        async ({ query, backend, timeout }, extra) => {
            try {
                const config = loadConfig(process.env, { backend, timeout });
                const report = await optimizeQuery(query, { config, signal: extra.signal });
                return textResult(formatReport(report));
            } catch (error) {
                logger.error(`optimize_pubmed_query failed: ${errorMessage(error)}`);
                return textResult(errorMessage(error), true);
            }
        }
    );

    server.tool(
        "analyze_pubmed_query",
        `Show how a PubMed boolean query is parsed, without contacting PubMed: tokens, minimal operator groups, the reconstructed query and the OR keywords that optimize_pubmed_query would try to remove.`,
        {
            query: z.string().describe("Boolean query using terms, AND, OR and parentheses"),
        },
        async ({ query }) => {
            try {
                return textResult(formatAnalysis(prepareQuery(query)));
            } catch (error) {
                return textResult(errorMessage(error), true);
            }
        }
    );

    return server;
}

/**
 * Serve the optimizer tools over stdio
 */
export async function startServer(): Promise<void> {
    const transport = new StdioServerTransport();
    await createServer().connect(transport);
    logger.log("MCP server listening on stdio");
}
