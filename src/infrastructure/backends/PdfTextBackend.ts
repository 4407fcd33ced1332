import { promises as fs } from "fs";
import type { ConversionBackend, ConversionOutput } from "../../ports/ConversionBackend";
import { PermanentProviderError } from "../../shared/errors/pipeline.errors";

const PDF_MAGIC = "%PDF-";

/** Text layer of a PDF via pdf-parse. The library is loaded on first use. */
export class PdfTextBackend implements ConversionBackend {
  readonly name = "pdf-parse";
  readonly kind = "pdf" as const;

  isAvailable(): boolean {
    try {
      require.resolve("pdf-parse");
      return true;
    } catch {
      return false;
    }
  }

  async convert(sourceLocation: string): Promise<ConversionOutput> {
    const buffer = await fs.readFile(sourceLocation);
    if (buffer.subarray(0, PDF_MAGIC.length).toString("latin1") !== PDF_MAGIC) {
      throw new PermanentProviderError(`${sourceLocation} is not a PDF document`);
    }

    const { default: pdfParse } = await import("pdf-parse");
    const parsed = await pdfParse(buffer);
    return { text: parsed.text.trim(), pageCount: parsed.numpages };
  }
}
