import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { createWorkItem } from "../../src/core/items/workItem";
import { HttpDownloader } from "../../src/infrastructure/http/HttpDownloader";
import { DownloadError } from "../../src/shared/errors/pipeline.errors";
import { sha256 } from "../../src/shared/hash/cacheKey";
import { startServer, type TestServer } from "../helpers/testServer";

const itemAt = (sourceLocation: string) => createWorkItem({ id: "item-1", title: "Paper", sourceLocation });

describe("HttpDownloader", () => {
  let dir: string;
  let server: TestServer;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "downloads-"));
    server = await startServer((req, res) => {
      if (req.url === "/paper.pdf") {
        res.writeHead(200, { "content-type": "application/pdf" });
        res.end("%PDF-1.4 test");
        return;
      }
      if (req.url === "/article") {
        res.writeHead(200, { "content-type": "text/html; charset=utf-8" });
        res.end("<p>hello</p>");
        return;
      }
      res.writeHead(req.url === "/busy" ? 503 : 404);
      res.end();
    });
  });

  afterEach(async () => {
    await server.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("stores the body under the sha256 of the URL, keeping the path extension", async () => {
    const url = `${server.baseUrl}/paper.pdf`;
    const downloader = new HttpDownloader(dir);

    const localPath = await downloader.download(itemAt(url));

    expect(localPath).toBe(path.join(dir, `${sha256(url)}.pdf`));
    await expect(fs.readFile(localPath, "utf-8")).resolves.toBe("%PDF-1.4 test");
    await expect(downloader.download(itemAt(url))).resolves.toBe(localPath);
  });

  it("derives the extension from the content type when the path has none", async () => {
    const url = `${server.baseUrl}/article`;

    await expect(new HttpDownloader(dir).download(itemAt(url))).resolves.toBe(
      path.join(dir, `${sha256(url)}.html`)
    );
  });

  it("treats 404 as final and 503 as retryable", async () => {
    const downloader = new HttpDownloader(dir);

    const missing = downloader.download(itemAt(`${server.baseUrl}/missing`));
    await expect(missing).rejects.toBeInstanceOf(DownloadError);
    await expect(missing).rejects.toMatchObject({ retryable: false, status: 404, code: "download_failed" });
    await expect(missing).rejects.toThrow(`Download of ${server.baseUrl}/missing failed: 404`);

    const busy = downloader.download(itemAt(`${server.baseUrl}/busy`));
    await expect(busy).rejects.toMatchObject({ retryable: true, status: 503 });
    await expect(busy).rejects.toThrow(`Download of ${server.baseUrl}/busy failed: 503`);
  });

  it("returns local paths and file URLs without fetching", async () => {
    const localFile = path.join(dir, "local.txt");
    const downloader = new HttpDownloader(dir);

    await expect(downloader.download(itemAt(localFile))).resolves.toBe(localFile);
    await expect(downloader.download(itemAt(pathToFileURL(localFile).href))).resolves.toBe(localFile);
  });
});
