/**
 * Optimizer configuration: defaults, environment overrides and validation
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { withTrailingSlash } from "./utils/shared";
import type { OracleBackend } from "./oracle/types";

export interface OptimizerConfig {
    /** Which result-count service to query */
    backend: OracleBackend;
    /** E-utilities base URL; a trailing "/" is added when missing */
    eutilsUrl: string;
    /** PubMed search page base URL */
    pubmedUrl: string;
    /** Timeout in ms for each result-count request */
    timeout: number;
    /** Extra attempts for a timed-out or failed request */
    retries: number;
    /** Linear backoff step between retries */
    backoffMs: number;
    /** NCBI API key for the E-utilities backend */
    apiKey?: string | undefined;
}

export const DEFAULT_CONFIG: Required<Omit<OptimizerConfig, "apiKey">> = {
    backend: "eutils",
    eutilsUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/",
    pubmedUrl: "https://pubmed.ncbi.nlm.nih.gov/",
    timeout: 10000,
    retries: 2,
    backoffMs: 1000,
};

const ENV_VARS = {
    backend: "PUBMED_BACKEND",
    eutilsUrl: "PUBMED_EUTILS_URL",
    pubmedUrl: "PUBMED_SEARCH_URL",
    timeout: "PUBMED_TIMEOUT_MS",
    retries: "PUBMED_RETRIES",
    backoffMs: "PUBMED_BACKOFF_MS",
    apiKey: "NCBI_API_KEY",
} as const satisfies Record<keyof OptimizerConfig, string>;

const baseUrlSchema = z.string().url().transform(withTrailingSlash);

const configSchema = z.object({
    backend: z.enum(["eutils", "html"]),
    eutilsUrl: baseUrlSchema,
    pubmedUrl: baseUrlSchema,
    timeout: z.coerce.number().int().positive(),
    retries: z.coerce.number().int().min(0).max(10),
    backoffMs: z.coerce.number().int().min(0),
    apiKey: z.string().min(1).optional(),
});

function isConfigKey(key: unknown): key is keyof typeof ENV_VARS {
    return typeof key === "string" && Object.hasOwn(ENV_VARS, key);
}

export type ConfigOverrides = Partial<Record<keyof OptimizerConfig, string | number | undefined>>;

/**
 * Merge defaults, environment variables and explicit overrides (highest
 * precedence) into a validated config. Invalid values raise ConfigError
 * naming the offending setting.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {}
): OptimizerConfig {
    const raw: Record<string, string | number | undefined> = { ...DEFAULT_CONFIG };

    for (const [key, envVar] of Object.entries(ENV_VARS)) {
        const value = env[envVar];
        if (value !== undefined && value !== "") {
            raw[key] = value;
        }
    }
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            raw[key] = value;
        }
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = issue?.path[0];
        const setting = isConfigKey(key) ? `${key} (${ENV_VARS[key]})` : "config";
        throw new ConfigError(`Invalid ${setting}: ${issue?.message ?? "unknown error"}`);
    }

    return parsed.data;
}
