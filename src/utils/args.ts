/**
 * Command-line option parsing
 */

import * as fs from "fs";
import type { ConfigOverrides } from "../config";
import { QueryError } from "../errors";

export const DEFAULT_QUERY = "Gene";

export type CliCommand = "optimize" | "parse" | "mcp" | "help";

export interface ResolvedCommand {
    /** null for an unrecognized command word */
    command: CliCommand | null;
    args: string[];
}

export interface CliOptions {
    query: string;
    filePath: string;
    json: boolean;
    debug: boolean;
    timing: boolean;
    help: boolean;
    overrides: ConfigOverrides;
}

/**
 * Pick the command from argv. No arguments, or options alone, mean optimize
 * (with the default query when none is given).
 */
export function resolveCommand(argv: string[]): ResolvedCommand {
    const [first, ...rest] = argv;

    switch (first) {
        case undefined:
            return { command: "optimize", args: [] };
        case "optimize":
        case "parse":
        case "mcp":
        case "help":
            return { command: first, args: rest };
        case "--help":
        case "-h":
            return { command: "help", args: rest };
        default:
            return first.startsWith("-")
                ? { command: "optimize", args: argv }
                : { command: null, args: argv };
    }
}

/**
 * Parse option flags; unknown arguments are ignored
 */
export function parseCliOptions(args: string[]): CliOptions {
    const options: CliOptions = {
        query: "",
        filePath: "",
        json: false,
        debug: false,
        timing: false,
        help: false,
        overrides: {},
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if ((arg === "--query" || arg === "-q") && nextArg !== undefined) {
            options.query = nextArg;
            i++;
        } else if ((arg === "--file" || arg === "-f") && nextArg !== undefined) {
            options.filePath = nextArg;
            i++;
        } else if (arg === "--backend" && nextArg !== undefined) {
            options.overrides.backend = nextArg;
            i++;
        } else if (arg === "--timeout" && nextArg !== undefined) {
            options.overrides.timeout = nextArg;
            i++;
        } else if (arg === "--retries" && nextArg !== undefined) {
            options.overrides.retries = nextArg;
            i++;
        } else if (arg === "--api-key" && nextArg !== undefined) {
            options.overrides.apiKey = nextArg;
            i++;
        } else if (arg === "--json") {
            options.json = true;
        } else if (arg === "--debug") {
            options.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            options.timing = true;
        } else if (arg === "--help" || arg === "-h") {
            options.help = true;
        }
    }

    return options;
}

/**
 * Resolve the query text: --file wins over --query, falling back to the default
 */
export function resolveQuery(options: CliOptions): string {
    if (options.filePath !== "") {
        if (!fs.existsSync(options.filePath)) {
            throw new QueryError(`File not found: ${options.filePath}`);
        }
        return fs.readFileSync(options.filePath, "utf8").trim();
    }
    const query = options.query.trim();
    return query === "" ? DEFAULT_QUERY : query;
}
