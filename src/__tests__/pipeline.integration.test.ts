import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { optimizeQuery, prepareQuery } from "../pipeline";
import { QueryError } from "../errors";
import { tokenText } from "../preprocessing/tokenize";
import { loadConfig } from "../config";
import { build, scriptedOracle, term } from "./helpers";

const ASTHMA_QUERY = "(asthma OR wheeze OR wheezing) AND (child OR children)";
const ASTHMA_SEARCH = "((asthma) OR (wheeze) OR (wheezing)) ((child) OR (children))";

beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
});

describe("prepareQuery", () => {
    it("runs every parsing stage", () => {
        const prepared = prepareQuery(ASTHMA_QUERY);

        expect(prepared.minimalGroups).toEqual([
            build(["asthma", "OR", "wheeze", "OR", "wheezing"]),
            build(["child", "OR", "children"]),
        ]);
        expect(prepared.flattened).toEqual(
            build([["asthma", "OR", "wheeze", "OR", "wheezing"], ["child", "OR", "children"]])
        );
        expect(prepared.searchQuery).toBe(ASTHMA_SEARCH);
        expect(prepared.orKeywords).toEqual([
            { term: "asthma", position: "after" },
            { term: "wheeze", position: "before" },
            { term: "wheezing", position: "before" },
            { term: "child", position: "before" },
            { term: "children", position: "before" },
        ]);
        expect(prepared.droppedTokens).toEqual([]);
    });

    it("optimizes a query without operators as a whole", () => {
        const prepared = prepareQuery("Gene");

        expect(prepared.minimalGroups).toEqual([build(["Gene"])]);
        expect(prepared.flattened).toEqual(term("Gene"));
        expect(prepared.searchQuery).toBe("(Gene)");
        expect(prepared.orKeywords).toEqual([{ term: "Gene" }]);
    });

    it("reports tokens dropped after an unmatched paren", () => {
        const prepared = prepareQuery("a) AND b");

        expect(prepared.tree).toEqual(build(["a"]));
        expect(prepared.droppedTokens.map(tokenText)).toEqual(["AND", "b"]);
        expect(prepared.searchQuery).toBe("(a)");
        expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("rejects a query with no search terms", () => {
        expect(() => prepareQuery("")).toThrow(QueryError);
        expect(() => prepareQuery("( AND OR )")).toThrow('Query has no search terms: "( AND OR )"');
    });
});

describe("optimizeQuery", () => {
    it("drops the keywords that leave the count unchanged", async () => {
        const oracle = scriptedOracle({
            [ASTHMA_SEARCH]: 500,
            "((wheeze) OR (wheezing)) ((child) OR (children))": 120,
            "((asthma) OR (wheezing)) ((child) OR (children))": 500,
            "((asthma)) ((child) OR (children))": 500,
            "((asthma)) ((child))": 480,
        });

        const report = await optimizeQuery(ASTHMA_QUERY, { oracle });

        expect(report.originalQuery).toBe(ASTHMA_QUERY);
        expect(report.searchQuery).toBe(ASTHMA_SEARCH);
        expect(report.backend).toBe("scripted");
        expect(report.baselineCount).toBe(500);
        expect(report.finalQuery).toBe("((asthma)) ((child) OR (children))");
        expect(report.excludedTerms).toEqual(["wheeze", "wheezing"]);
        expect(report.steps.map(s => s.found)).toEqual([true, true, true, false, true]);
        expect(oracle.calls).toHaveLength(5);
    });

    it("builds the oracle from config when none is given", async () => {
        const fetchMock = vi.fn(async (_url: string) =>
            new Response(JSON.stringify({ esearchresult: { count: "9" } }), { status: 200 })
        );
        vi.stubGlobal("fetch", fetchMock);
        const config = loadConfig({}, { eutilsUrl: "https://eutils.test/entrez/eutils/", retries: 0 });

        const report = await optimizeQuery("cat OR feline", { config });

        expect(report.backend).toBe("eutils");
        expect(report.searchQuery).toBe("((cat) OR (feline))");
        expect(report.excludedTerms).toEqual(["cat"]);
        expect(report.finalQuery).toBe("((feline))");
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("fails before any oracle call on an empty query", async () => {
        const oracle = scriptedOracle({});

        await expect(optimizeQuery("   ", { oracle })).rejects.toBeInstanceOf(QueryError);
        expect(oracle.calls).toEqual([]);
    });
});
