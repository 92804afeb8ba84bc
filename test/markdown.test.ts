import { describe, expect, it } from "vitest";
import { sliceFragment } from "../src/content-extractor.js";
import { renderMarkdown, renderMarkdownPage } from "../src/markdown.js";

describe("renderMarkdown", () => {
  it("renders headings with anchors", () => {
    const html = renderMarkdown("# Hello\n\nText");
    expect(html).toContain('<h1 id="hello">Hello</h1>');
    expect(html).toContain("<p>Text</p>");
  });

  it("numbers repeated heading anchors", () => {
    const html = renderMarkdown("## Options\n\n## Options\n");
    expect(html).toContain('<h2 id="options">Options</h2>');
    expect(html).toContain('<h2 id="options-1">Options</h2>');
  });

  it("supports GitHub Flavored Markdown features", () => {
    const markdown = String.raw`| a | b |
| - | - |
| 1 | 2 |

~~strike~~`;
    const html = renderMarkdown(markdown);
    expect(html).toContain("<table>");
    expect(html).toContain("<del>strike</del>");
  });

  it("highlights fenced code with a known language", () => {
    const html = renderMarkdown("```ts\nconst x = 1;\n```\n");
    expect(html).toContain('<code class="hljs language-typescript">');
  });

  it("escapes fenced code without a language", () => {
    const html = renderMarkdown("```\nplain <b>\n```\n");
    expect(html).toContain('<pre><code class="hljs">plain &lt;b&gt;</code></pre>');
  });
});

describe("renderMarkdownPage", () => {
  it("places the rendered source in the manpage article", () => {
    const page = renderMarkdownPage("# NAME\n", "/docs/tool.1.md");

    expect(page).toContain("<title>tool.1.md</title>");
    expect(sliceFragment(page)).toBe('<h1 id="name">NAME</h1>\n');
  });
});
