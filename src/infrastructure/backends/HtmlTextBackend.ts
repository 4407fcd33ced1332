import { promises as fs } from "fs";
import { load } from "cheerio";
import type { ConversionBackend, ConversionOutput } from "../../ports/ConversionBackend";
import { PermanentProviderError } from "../../shared/errors/pipeline.errors";

const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, pre, table, blockquote";
const CONTAINERS = "li, pre, table, blockquote";

const collapse = (value: string): string => value.replace(/\s+/g, " ").trim();

const renderTable = (rows: string[][]): string => {
  if (rows.length === 0) return "";
  const width = Math.max(...rows.map((cells) => cells.length));
  const line = (cells: string[]) =>
    `| ${Array.from({ length: width }, (_, index) => cells[index] ?? "").join(" | ")} |`;
  const separator = `| ${Array.from({ length: width }, () => "---").join(" | ")} |`;
  return [line(rows[0]), separator, ...rows.slice(1).map(line)].join("\n");
};

/** Markdown-flavoured text from HTML via cheerio: headings, lists, code blocks, tables. */
export const htmlToText = (html: string): string => {
  const $ = load(html);
  $("script, style, noscript, nav, header, footer, svg").remove();

  const blocks: string[] = [];
  $(BLOCKS).each((_, element) => {
    const node = $(element);
    if (node.parents(CONTAINERS).length > 0) return;

    const tag = element.tagName.toLowerCase();
    if (/^h[1-6]$/.test(tag)) {
      const text = collapse(node.text());
      if (text) blocks.push(`${"#".repeat(Number(tag[1]))} ${text}`);
      return;
    }
    if (tag === "li") {
      const text = collapse(node.text());
      if (text) blocks.push(`- ${text}`);
      return;
    }
    if (tag === "pre") {
      blocks.push(`\`\`\`\n${node.text().replace(/\n+$/, "")}\n\`\`\``);
      return;
    }
    if (tag === "table") {
      const rows: string[][] = [];
      node.find("tr").each((__, row) => {
        const cells = $(row)
          .find("th, td")
          .map((___, cell) => collapse($(cell).text()).replace(/\|/g, "\\|"))
          .get();
        if (cells.length > 0) rows.push(cells);
      });
      const table = renderTable(rows);
      if (table) blocks.push(table);
      return;
    }
    const text = collapse(node.text());
    if (text) blocks.push(tag === "blockquote" ? `> ${text}` : text);
  });

  if (blocks.length === 0) return collapse($("body").text());
  return blocks.join("\n\n");
};

export class HtmlTextBackend implements ConversionBackend {
  readonly name = "cheerio-html";
  readonly kind = "html" as const;

  isAvailable(): boolean {
    return true;
  }

  async convert(sourceLocation: string): Promise<ConversionOutput> {
    const raw = await fs.readFile(sourceLocation, "utf-8");
    if (!/<(html|body|div|p|h[1-6]|article)[\s>]/i.test(raw)) {
      throw new PermanentProviderError(`${sourceLocation} does not look like HTML`);
    }
    return { text: htmlToText(raw) };
  }
}
