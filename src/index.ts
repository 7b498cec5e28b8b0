export type * from "./types";
export { tokenize, tokenText, toOperator } from "./preprocessing/tokenize";
export { parseQuery, parseTokens, parseTokenStream, type ParsedTokenStream } from "./preprocessing/parse";
export { containsOperator, extractMinimalGroups } from "./extraction/groups";
export { flattenNode, flattenGroups } from "./extraction/flatten";
export { tagOrKeywords, removalText } from "./extraction/keywords";
export { reconstructQuery } from "./output/reconstruct";
export { formatReport, reportToJson, formatAnalysis } from "./output/report";
export { eliminateRedundantTerms, type EliminationOptions } from "./optimizer/eliminate";
export {
    prepareQuery,
    optimizeQuery,
    type PreparedQuery,
    type OptimizationReport,
    type OptimizeOptions,
} from "./pipeline";
export { createOracle } from "./oracle";
export { createEutilsOracle, parseEsearchCount } from "./oracle/eutils";
export { createPubmedHtmlOracle, parseResultCount } from "./oracle/pubmed-html";
export { withRetry } from "./oracle/retry";
export type { ResultCountOracle, OracleBackend, RetryOptions } from "./oracle/types";
export { loadConfig, DEFAULT_CONFIG, type OptimizerConfig, type ConfigOverrides } from "./config";
export { QueryError, ConfigError, OracleError, type OracleErrorKind } from "./errors";
