import { describe, expect, test } from "vitest";
import {
  collapseBlankLines,
  extractPageContent,
  flattenRegion,
  parseHtml,
  partitionAtHeadings,
  serializePageContent,
} from "../src/content";
import { buildCrawlScope } from "../src/utils";

const START_URL = "https://developer.example.org/en-US/docs/Web/CSS";
const PAGE_URL = `${START_URL}/CSS_anchor_positioning`;

const scope = buildCrawlScope(START_URL, {
  locale: "en-US",
  externalSections: ["/api/"],
});

const extract = (html: string, pageUrl = PAGE_URL) =>
  extractPageContent(parseHtml(html, pageUrl), pageUrl, scope);

const linesOf = (html: string, pageUrl = PAGE_URL): string[] => {
  const page = extract(html, pageUrl);
  if (!page) {
    throw new Error("expected the page to have a main region");
  }
  return page.renderedLines;
};

describe("page extraction", () => {
  test("returns null without a main content region", () => {
    expect(extract("<html><body><div><p>Loose text</p></div></body></html>")).toBeNull();
  });

  test("renders title, source, intro and heading sections", () => {
    const html = `<html><body>
      <nav><a href="/en-US/docs/Web/HTML">HTML</a></nav>
      <main>
        <header><h1>CSS anchor positioning</h1></header>
        <div class="section-content">
          <p>The <strong>anchor</strong> module lets you <a href="/en-US/docs/Web/CSS/position">position</a> elements.</p>
        </div>
        <section>
          <h2>Properties</h2>
          <ul>
            <li><a href="/en-US/docs/Web/CSS/anchor-name"><code>anchor-name</code></a></li>
            <li>Plain item</li>
          </ul>
        </section>
        <h2>See also</h2>
        <p>Read <a href="https://other.example.com/guide">the guide</a>.</p>
        <aside class="metadata">Last modified</aside>
      </main>
    </body></html>`;

    expect(linesOf(html)).toEqual([
      "# CSS anchor positioning",
      "",
      `Source: ${PAGE_URL}`,
      "",
      "The anchor module lets you [position](#position) elements.",
      "",
      "## Properties",
      "",
      "- [`anchor-name`](#anchor-name)",
      "- Plain item",
      "",
      "## See also",
      "",
      "Read [the guide](https://other.example.com/guide) .",
    ]);
  });

  test("falls back to the last path segment for the title", () => {
    const lines = linesOf(
      "<main><p>No heading here.</p></main>",
      `${START_URL}/anchor-name`
    );
    expect(lines).toEqual([
      "# anchor-name",
      "",
      `Source: ${START_URL}/anchor-name`,
      "",
      "No heading here.",
    ]);
  });

  test("keeps headings whose section has no body", () => {
    const lines = linesOf(
      "<main><h1>Empty</h1><h2>Syntax</h2><h2>Values</h2><p>v</p></main>"
    );
    expect(lines.slice(4)).toEqual(["## Syntax", "", "## Values", "", "v"]);
  });

  test("drops interactive examples and page chrome", () => {
    const lines = linesOf(`<main>
      <h1>Grid</h1>
      <div class="interactive-example"><p>Try it</p></div>
      <iframe src="https://example.com/live"></iframe>
      <p>Grid layout.</p>
      <footer><p>Footer text</p></footer>
    </main>`);
    expect(lines.slice(4)).toEqual(["Grid layout."]);
  });

  test("emits each code snippet only once", () => {
    const lines = linesOf(`<main>
      <h1>Array.prototype.map()</h1>
      <pre class="brush: js notranslate">const doubled = [1, 2].map((x) =&gt; x * 2);</pre>
      <ul>
        <li><code>const doubled = [1, 2].map((x) =&gt; x * 2);</code></li>
        <li><code>thisArg</code> is optional</li>
      </ul>
      <p>Use <code>thisArg</code> again.</p>
    </main>`);
    expect(lines.slice(4)).toEqual([
      "```js",
      "const doubled = [1, 2].map((x) => x * 2);",
      "```",
      "",
      "- `thisArg` is optional",
      "",
      "Use again.",
    ]);
  });

  test("never suppresses links that wrap already seen code", () => {
    const lines = linesOf(`<main>
      <h1>Links</h1>
      <p><code>inset</code> shorthand</p>
      <p>See <a href="/en-US/docs/Web/CSS/inset"><code>inset</code></a>.</p>
    </main>`);
    expect(lines.slice(4)).toEqual([
      "`inset` shorthand",
      "",
      "See [`inset`](#inset) .",
    ]);
  });

  test("keeps multi-line code blocks verbatim", () => {
    const lines = linesOf(
      '<main><h1>Code</h1><pre><code class="language-css">\n.box {\n\n  color: red;\n}\n</code></pre></main>'
    );
    expect(lines.slice(4)).toEqual([
      "```css",
      ".box {",
      "",
      "  color: red;",
      "}",
      "```",
    ]);
  });

  test("renders nested lists with indentation", () => {
    const lines = linesOf(
      "<main><h1>Lists</h1><ul><li>Parent<ul><li>Child</li></ul></li><li>Sibling</li></ul></main>"
    );
    expect(lines.slice(4)).toEqual(["- Parent", "  - Child", "- Sibling"]);
  });

  test("renders definition lists as bold terms with indented details", () => {
    const lines = linesOf(`<main><h1>Values</h1><dl>
      <dt><code>anchor-name</code></dt><dd>Names an element.</dd>
      <dt>position-anchor</dt><dd>Sets the default anchor.</dd>
    </dl></main>`);
    expect(lines.slice(4)).toEqual([
      "**`anchor-name`**",
      "  Names an element.",
      "",
      "**position-anchor**",
      "  Sets the default anchor.",
    ]);
  });

  test("renders tables through turndown with rewritten links", () => {
    const lines = linesOf(
      '<main><h1>Table</h1><table><tr><th>Property</th></tr><tr><td><a href="/en-US/docs/Web/CSS/top">top</a></td></tr></table></main>'
    );
    const body = lines.slice(4).join("\n");
    expect(body).toContain("| Property |");
    expect(body).toContain("[top](#top)");
  });

  test("does not modify the parsed document", () => {
    const document = parseHtml(
      '<main><h1>Stable</h1><div class="interactive">x</div><h2>Part</h2><p><code>a</code></p></main>',
      PAGE_URL
    );
    const first = extractPageContent(document, PAGE_URL, scope);
    const second = extractPageContent(document, PAGE_URL, scope);
    expect(second).toEqual(first);
    expect(document.querySelector(".interactive")).not.toBeNull();
  });

  test("serializes lines with a trailing newline", () => {
    expect(
      serializePageContent({
        title: "T",
        sourceUrl: PAGE_URL,
        renderedLines: ["# T", "", "body"],
      })
    ).toBe("# T\n\nbody\n");
  });
});

describe("segmentation", () => {
  test("headings nested in wrappers still partition their siblings", () => {
    const document = parseHtml(
      "<main><p>Intro</p><div><h2>A</h2><p>a1</p></div><p>a2</p><h3>B</h3><p>b</p></main>",
      PAGE_URL
    );
    const region = document.querySelector("main");
    if (!region) {
      throw new Error("missing main");
    }

    const groups = partitionAtHeadings(flattenRegion(region));
    expect(
      groups.map((group) => ({
        heading: group.heading,
        blocks: group.blocks.map((block) => block.textContent),
      }))
    ).toEqual([
      { heading: null, blocks: ["Intro"] },
      { heading: { level: 2, text: "A" }, blocks: ["a1", "a2"] },
      { heading: { level: 3, text: "B" }, blocks: ["b"] },
    ]);
  });

  test("loose text becomes its own block", () => {
    const document = parseHtml("<main>Loose <em>words</em><p>p</p></main>", PAGE_URL);
    const region = document.querySelector("main");
    if (!region) {
      throw new Error("missing main");
    }
    const units = flattenRegion(region);
    expect(units.map((unit) => unit.kind)).toEqual(["block", "block", "block"]);
  });
});

describe("blank line collapsing", () => {
  test("collapses runs and trims the ends outside fences", () => {
    expect(
      collapseBlankLines(["", "a", "", "", "b", "```", "", "", "```", "", ""])
    ).toEqual(["a", "", "b", "```", "", "", "```"]);
  });
});
