import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { HtmlTextBackend, htmlToText } from "../../src/infrastructure/backends/HtmlTextBackend";
import { PdfTextBackend } from "../../src/infrastructure/backends/PdfTextBackend";
import { PlainTextBackend } from "../../src/infrastructure/backends/PlainTextBackend";
import { PermanentProviderError } from "../../src/shared/errors/pipeline.errors";

describe("htmlToText", () => {
  it("renders block elements as markdown-like text", () => {
    const html = [
      "<html><head><style>p { color: red; }</style></head><body>",
      "<nav>Menu</nav>",
      "<h1>Title</h1>",
      "<p>First   paragraph.</p>",
      "<ul><li>one</li><li>two <b>bold</b></li></ul>",
      "<pre>const x = 1;\n</pre>",
      "<table><tr><th>a</th><th>b</th></tr><tr><td>1</td><td>x|y</td></tr></table>",
      "<blockquote><p>quoted</p></blockquote>",
      "</body></html>"
    ].join("");

    expect(htmlToText(html)).toBe(
      [
        "# Title",
        "First paragraph.",
        "- one",
        "- two bold",
        "```\nconst x = 1;\n```",
        "| a | b |\n| --- | --- |\n| 1 | x\\|y |",
        "> quoted"
      ].join("\n\n")
    );
  });

  it("falls back to the body text when there are no block elements", () => {
    expect(htmlToText("<div>Just <span>some</span>   text</div>")).toBe("Just some text");
  });
});

describe("file based backends", () => {
  let dir: string;

  const write = async (name: string, contents: string) => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, contents);
    return filePath;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "backends-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("HtmlTextBackend converts HTML files and rejects other content", async () => {
    const backend = new HtmlTextBackend();
    const page = await write("page.html", "<html><body><h2>Results</h2><p>It works.</p></body></html>");
    const notes = await write("notes.txt", "plain words only");

    await expect(backend.convert(page)).resolves.toEqual({ text: "## Results\n\nIt works." });
    const rejected = backend.convert(notes);
    await expect(rejected).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(rejected).rejects.toThrow(`${notes} does not look like HTML`);
  });

  it("PlainTextBackend normalizes line endings and never throws", async () => {
    const backend = new PlainTextBackend();

    await expect(backend.convert(await write("a.txt", "line one\r\nline two\r\n"))).resolves.toEqual({
      text: "line one\nline two"
    });
    await expect(backend.convert(await write("b.bin", "abc\u0000def"))).resolves.toEqual({ text: "" });
    await expect(backend.convert(path.join(dir, "missing.txt"))).resolves.toEqual({ text: "" });
  });

  it("PdfTextBackend rejects files without the PDF header", async () => {
    const backend = new PdfTextBackend();
    const notPdf = await write("fake.pdf", "hello");

    expect(backend.isAvailable()).toBe(true);
    const rejected = backend.convert(notPdf);
    await expect(rejected).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(rejected).rejects.toThrow(`${notPdf} is not a PDF document`);
  });
});
