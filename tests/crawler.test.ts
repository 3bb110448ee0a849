import { describe, expect, test } from "vitest";
import { crawlDocumentation, type CrawlSettings } from "../src/crawler";
import { countSavedNodes, treeDepth } from "../src/tree";
import type {
  DocumentNode,
  FetchResult,
  PageContent,
  PageFetcher,
  PageStore,
} from "../src/types";
import { slugify } from "../src/utils";

const ORIGIN = "https://docs.example.org";
const START_URL = `${ORIGIN}/en-US/docs/guide`;

const SETTINGS: CrawlSettings = {
  concurrency: 3,
  maxDepth: 3,
  maxPages: undefined,
  locale: "en-US",
  externalSections: ["/api/"],
};

interface FakePage {
  title: string;
  links?: string[];
  html?: string;
}

function renderPage(page: FakePage): string {
  if (page.html !== undefined) {
    return page.html;
  }
  const anchors = (page.links ?? [])
    .map((href) => `<a href="${href}">${href}</a>`)
    .join(" ");
  return `<html><body><main><h1>${page.title}</h1><p>Body of ${page.title}. ${anchors}</p></main></body></html>`;
}

/** In-process site keyed by absolute URL; unknown URLs answer 404. */
function createFakeSite(pages: Record<string, FakePage>): {
  fetchPage: PageFetcher;
  fetched: string[];
} {
  const fetched: string[] = [];
  const fetchPage: PageFetcher = async (url): Promise<FetchResult> => {
    fetched.push(url);
    await Promise.resolve();
    const page = pages[url];
    if (!page) {
      return {
        ok: false,
        failure: { kind: "status", url, status: 404, message: "HTTP 404 Not Found" },
      };
    }
    return { ok: true, body: renderPage(page) };
  };
  return { fetchPage, fetched };
}

class MemoryPageStore implements PageStore {
  readonly files = new Map<string, string>();

  async save(page: PageContent): Promise<string> {
    const fileName = `${slugify(page.title)}.md`;
    this.files.set(fileName, page.renderedLines.join("\n"));
    return fileName;
  }

  async load(contentFile: string): Promise<string | null> {
    return this.files.get(contentFile) ?? null;
  }
}

const summarize = (node: DocumentNode): unknown => ({
  title: node.title,
  contentFile: node.contentFile,
  children: node.children.map(summarize),
});

describe("crawler", () => {
  test("builds the tree from accepted links and fetches nothing else", async () => {
    const { fetchPage, fetched } = createFakeSite({
      [START_URL]: {
        title: "Guide",
        links: [
          "/en-US/docs/guide/alpha",
          "/en-US/docs/guide/beta",
          "/en-US/docs/other",
          "https://elsewhere.example.com/en-US/docs/guide/x",
          "/en-US/docs/guide/alpha#part",
          "/en-US/docs/guide/manual.pdf",
          "/fr/docs/guide/alpha",
        ],
      },
      [`${START_URL}/alpha`]: {
        title: "Alpha",
        links: ["/en-US/docs/guide/beta", "/en-US/docs/guide"],
      },
      [`${START_URL}/beta`]: {
        title: "Beta",
        links: ["/en-US/docs/guide/beta/gamma"],
      },
      [`${START_URL}/beta/gamma`]: { title: "Gamma" },
    });
    const store = new MemoryPageStore();

    const report = await crawlDocumentation(START_URL, SETTINGS, {
      fetchPage,
      store,
    });

    expect(summarize(report.root)).toEqual({
      title: "Guide",
      contentFile: "guide.md",
      children: [
        { title: "Alpha", contentFile: "alpha.md", children: [] },
        {
          title: "Beta",
          contentFile: "beta.md",
          children: [{ title: "Gamma", contentFile: "gamma.md", children: [] }],
        },
      ],
    });
    expect([...fetched].sort()).toEqual(
      [
        START_URL,
        `${START_URL}/alpha`,
        `${START_URL}/beta`,
        `${START_URL}/beta/gamma`,
      ].sort()
    );
    expect(report.claimed).toHaveLength(4);
    expect(report.savedCount).toBe(4);
    expect(report.failures).toEqual([]);
    expect(store.files.get("alpha.md")).toContain(`Source: ${START_URL}/alpha`);
  });

  test("stops descending past the depth bound", async () => {
    const chain = ["d1", "d2", "d3", "d4", "d5"];
    const pages: Record<string, FakePage> = {
      [START_URL]: { title: "Root", links: ["/en-US/docs/guide/d1"] },
    };
    chain.forEach((name, index) => {
      const next = chain[index + 1];
      pages[`${START_URL}/${name}`] = {
        title: name,
        links: next ? [`/en-US/docs/guide/${next}`] : [],
      };
    });
    const { fetchPage, fetched } = createFakeSite(pages);

    const report = await crawlDocumentation(
      START_URL,
      { ...SETTINGS, maxDepth: 3 },
      { fetchPage, store: new MemoryPageStore() }
    );

    expect(treeDepth(report.root)).toBe(3);
    expect(fetched).not.toContain(`${START_URL}/d4`);
    expect(report.claimed).toEqual([
      START_URL,
      `${START_URL}/d1`,
      `${START_URL}/d2`,
      `${START_URL}/d3`,
    ]);
  });

  test("never claims more pages than the cap across branches", async () => {
    const { fetchPage, fetched } = createFakeSite({
      [START_URL]: {
        title: "Root",
        links: ["/en-US/docs/guide/a", "/en-US/docs/guide/b"],
      },
      [`${START_URL}/a`]: {
        title: "A",
        links: ["/en-US/docs/guide/a/1", "/en-US/docs/guide/a/2"],
      },
      [`${START_URL}/b`]: {
        title: "B",
        links: ["/en-US/docs/guide/b/1", "/en-US/docs/guide/b/2"],
      },
      [`${START_URL}/a/1`]: { title: "A1" },
      [`${START_URL}/a/2`]: { title: "A2" },
      [`${START_URL}/b/1`]: { title: "B1" },
      [`${START_URL}/b/2`]: { title: "B2" },
    });

    const report = await crawlDocumentation(
      START_URL,
      { ...SETTINGS, maxPages: 4 },
      { fetchPage, store: new MemoryPageStore() }
    );

    expect(report.claimed).toHaveLength(4);
    expect(fetched).toHaveLength(4);
    expect(countSavedNodes(report.root)).toBe(4);
  });

  test("drops failed and content-less pages but keeps crawling siblings", async () => {
    const { fetchPage } = createFakeSite({
      [START_URL]: {
        title: "Root",
        links: [
          "/en-US/docs/guide/missing",
          "/en-US/docs/guide/bare",
          "/en-US/docs/guide/ok",
        ],
      },
      [`${START_URL}/bare`]: {
        title: "Bare",
        html: '<html><body><div><a href="/en-US/docs/guide/hidden">x</a></div></body></html>',
      },
      [`${START_URL}/ok`]: { title: "Ok" },
      [`${START_URL}/hidden`]: { title: "Hidden" },
    });

    const report = await crawlDocumentation(START_URL, SETTINGS, {
      fetchPage,
      store: new MemoryPageStore(),
    });

    expect(report.root.children.map((child) => child.title)).toEqual(["Ok"]);
    expect(report.failures).toEqual([
      {
        kind: "status",
        url: `${START_URL}/missing`,
        status: 404,
        message: "HTTP 404 Not Found",
      },
    ]);
    expect(report.claimed).not.toContain(`${START_URL}/hidden`);
  });

  test("a page that cannot be saved ends only its own branch", async () => {
    const { fetchPage } = createFakeSite({
      [START_URL]: {
        title: "Root",
        links: ["/en-US/docs/guide/a", "/en-US/docs/guide/b"],
      },
      [`${START_URL}/a`]: { title: "A", links: ["/en-US/docs/guide/a/deep"] },
      [`${START_URL}/b`]: { title: "B" },
      [`${START_URL}/a/deep`]: { title: "Deep" },
    });
    class FailingStore extends MemoryPageStore {
      override async save(page: PageContent): Promise<string> {
        if (page.title === "A") {
          throw new Error("EACCES: permission denied");
        }
        return super.save(page);
      }
    }

    const report = await crawlDocumentation(START_URL, SETTINGS, {
      fetchPage,
      store: new FailingStore(),
    });

    expect(report.root.children.map((child) => child.title)).toEqual(["B"]);
    expect(report.savedCount).toBe(2);
    expect(report.claimed).not.toContain(`${START_URL}/a/deep`);
  });

  test("claims the start URL in its resolved form", async () => {
    const { fetchPage, fetched } = createFakeSite({
      [START_URL]: { title: "Root", links: ["/en-US/docs/guide/a"] },
      [`${START_URL}/a`]: { title: "A", links: ["/en-US/docs/guide"] },
    });

    const report = await crawlDocumentation(
      "https://DOCS.example.org:443/en-US/docs/guide",
      SETTINGS,
      { fetchPage, store: new MemoryPageStore() }
    );

    expect(report.claimed).toEqual([START_URL, `${START_URL}/a`]);
    expect(fetched).toEqual([START_URL, `${START_URL}/a`]);
    expect(report.root.sourceUrl).toBe(START_URL);
    expect(report.root.children.map((child) => child.title)).toEqual(["A"]);
  });

  test("falls back to an empty root when the start page fails", async () => {
    const { fetchPage } = createFakeSite({});

    const report = await crawlDocumentation(START_URL, SETTINGS, {
      fetchPage,
      store: new MemoryPageStore(),
    });

    expect(report.root).toEqual({ title: "", sourceUrl: START_URL, children: [] });
    expect(report.savedCount).toBe(0);
  });

  test("does not start when the signal is already aborted", async () => {
    const { fetchPage, fetched } = createFakeSite({
      [START_URL]: { title: "Root" },
    });
    const controller = new AbortController();
    controller.abort();

    const report = await crawlDocumentation(START_URL, SETTINGS, {
      fetchPage,
      store: new MemoryPageStore(),
      signal: controller.signal,
    });

    expect(fetched).toEqual([]);
    expect(report.claimed).toEqual([]);
  });

  test("keeps in-flight page work within the concurrency limit", async () => {
    const children = ["c1", "c2", "c3", "c4", "c5", "c6"];
    const pages: Record<string, FakePage> = {
      [START_URL]: {
        title: "Root",
        links: children.map((name) => `/en-US/docs/guide/${name}`),
      },
    };
    for (const name of children) {
      pages[`${START_URL}/${name}`] = { title: name };
    }
    const site = createFakeSite(pages);
    let inFlight = 0;
    let peak = 0;
    const fetchPage: PageFetcher = async (url) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return site.fetchPage(url);
    };

    const report = await crawlDocumentation(
      START_URL,
      { ...SETTINGS, concurrency: 2 },
      { fetchPage, store: new MemoryPageStore() }
    );

    expect(peak).toBe(2);
    expect(report.root.children.map((child) => child.title)).toEqual(children);
  });
});
