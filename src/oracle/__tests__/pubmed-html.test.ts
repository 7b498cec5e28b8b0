import { describe, it, expect, vi, afterEach } from "vitest";
import { createPubmedHtmlOracle, parseResultCount } from "../pubmed-html";

function resultsPage(amount: string): string {
    return `<!DOCTYPE html>
<html>
<body>
  <main class="search-page">
    <div class="results-amount-container">
      <div class="results-amount">${amount}</div>
    </div>
  </main>
</body>
</html>`;
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe("parseResultCount", () => {
    it("reads the count and strips thousand separators", () => {
        const html = resultsPage('<h3><span class="value">12,345</span> results</h3>');

        expect(parseResultCount(html, "asthma")).toBe(12345);
    });

    it("treats the no-results notice as zero", () => {
        const html = resultsPage("<span>\n  No results were found.\n</span>");

        expect(parseResultCount(html, "zzzz")).toBe(0);
    });

    it("fails when the page has no count", () => {
        expect(() => parseResultCount("<html><body>Article page</body></html>", "gene")).toThrow(
            'No result count on PubMed page (found nothing at div.results-amount > h3 > span.value) (query: "gene")'
        );
    });

    it("fails on a non-numeric count", () => {
        const html = resultsPage('<h3><span class="value">many</span> results</h3>');

        expect(() => parseResultCount(html, "gene")).toThrow('found "many"');
    });
});

describe("createPubmedHtmlOracle", () => {
    it("requests the search page for the query", async () => {
        const fetchMock = vi.fn(async (_url: string) =>
            new Response(resultsPage('<h3><span class="value">7</span> results</h3>'), {
                status: 200,
                headers: { "Content-Type": "text/html" },
            })
        );
        vi.stubGlobal("fetch", fetchMock);
        const oracle = createPubmedHtmlOracle({ baseUrl: "https://pubmed.test/" });

        const count = await oracle.count("(cat) OR (feline)");

        expect(count).toBe(7);
        expect(oracle.name).toBe("html");
        const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
        expect(url.origin).toBe("https://pubmed.test");
        expect(url.pathname).toBe("/");
        expect(url.searchParams.get("term")).toBe("(cat) OR (feline)");
    });

    it("searches under the path of the base URL", async () => {
        const fetchMock = vi.fn(async (_url: string) =>
            new Response(resultsPage('<h3><span class="value">2</span> results</h3>'), { status: 200 })
        );
        vi.stubGlobal("fetch", fetchMock);

        await createPubmedHtmlOracle({ baseUrl: "https://mirror.test/pubmed/" }).count("a");
        await createPubmedHtmlOracle({ baseUrl: "https://mirror.test/pubmed" }).count("b");

        const urls = fetchMock.mock.calls.map(c => String(c[0]));
        expect(urls).toEqual([
            "https://mirror.test/pubmed/?term=a",
            "https://mirror.test/pubmed/?term=b",
        ]);
    });

    it("reports an unreadable page as a parse error", async () => {
        vi.stubGlobal("fetch", vi.fn(async () => new Response("<html></html>", { status: 200 })));
        const oracle = createPubmedHtmlOracle({ baseUrl: "https://pubmed.test/" });

        await expect(oracle.count("gene")).rejects.toMatchObject({ kind: "parse", query: "gene" });
    });
});
