#!/usr/bin/env node

import { loadConfig } from "./config";
import { prepareQuery, optimizeQuery } from "./pipeline";
import { formatAnalysis, formatReport, reportToJson } from "./output/report";
import { DEFAULT_QUERY, parseCliOptions, resolveCommand, resolveQuery } from "./utils/args";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
pubmed-query-optimizer - Remove redundant keywords from a PubMed boolean query

Parses a query built from terms, AND/OR and parentheses, rebuilds its smallest
operator groups, then drops every OR keyword whose removal leaves the PubMed
result count unchanged.

COMMANDS:
  optimize [options]   Optimize a query (default when no command is given)
  parse [options]      Show tokens, groups and keywords without querying PubMed
  mcp                  Start the MCP server on stdio
  help, --help         Show this help message

OPTIONS:
  --query, -q "text"   Query to optimize (default: "${DEFAULT_QUERY}")
  --file, -f path      Read the query from a file
  --backend name       Result-count backend: eutils (default) or html
  --timeout ms         Timeout per PubMed request (default: 10000)
  --retries n          Retries for a failed request (default: 2)
  --api-key key        NCBI API key (eutils backend)
  --json               Print the report as JSON
  --debug              Log every removal attempt
  --timing, -t         Show performance timing breakdown

ENVIRONMENT:
  PUBMED_BACKEND, PUBMED_TIMEOUT_MS, PUBMED_RETRIES, PUBMED_BACKOFF_MS,
  PUBMED_EUTILS_URL, PUBMED_SEARCH_URL, NCBI_API_KEY

EXAMPLES:
  pubmed-query-optimizer -q "(asthma OR wheeze OR wheezing) AND (child OR children)"
  pubmed-query-optimizer parse -q "(a AND b) OR (c AND (d OR e))"
  pubmed-query-optimizer --file query.txt --backend html --json
`;

async function runOptimize(args: string[]): Promise<void> {
    const options = parseCliOptions(args);
    if (options.help) {
        console.log(HELP_TEXT);
        return;
    }
    logger.setDebugEnabled(options.debug);
    logger.setTimingEnabled(options.timing);

    const config = loadConfig(process.env, options.overrides);
    const query = resolveQuery(options);
    logger.log(`Query: "${query}"`);

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

    const report = await optimizeQuery(query, { config, signal: controller.signal });

    if (options.timing) {
        logger.printTimings();
    }

    console.log(options.json ? reportToJson(report) : "\n" + formatReport(report));
}

function runParse(args: string[]): void {
    const options = parseCliOptions(args);
    if (options.help) {
        console.log(HELP_TEXT);
        return;
    }
    logger.setDebugEnabled(options.debug);

    const prepared = prepareQuery(resolveQuery(options));
    console.log(options.json ? JSON.stringify(prepared, null, 2) : formatAnalysis(prepared));
}

async function main(): Promise<void> {
    const argv = process.argv.slice(2).filter((a) => a !== "--");
    const { command, args } = resolveCommand(argv);

    switch (command) {
        case "optimize": {
            await runOptimize(args);
            break;
        }

        case "parse": {
            runParse(args);
            break;
        }

        case "mcp": {
            const { startServer } = await import("./mcp/server");
            await startServer();
            break;
        }

        case "help": {
            console.log(HELP_TEXT);
            break;
        }

        case null: {
            console.log(`Unknown command: ${argv[0]}`);
            console.log("Run 'pubmed-query-optimizer --help' for usage.\n");
            process.exit(1);
        }
    }
}

// Run main
main().catch((err) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
});
