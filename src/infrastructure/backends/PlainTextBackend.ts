import { promises as fs } from "fs";
import type { ConversionBackend, ConversionOutput } from "../../ports/ConversionBackend";

/**
 * Last resort: the file read as UTF-8. Never throws; unreadable or binary
 * input yields empty text, which the chain records as a failed attempt.
 */
export class PlainTextBackend implements ConversionBackend {
  readonly name = "plain-text";
  readonly kind = "plain_text" as const;

  isAvailable(): boolean {
    return true;
  }

  async convert(sourceLocation: string): Promise<ConversionOutput> {
    let text: string;
    try {
      text = await fs.readFile(sourceLocation, "utf-8");
    } catch {
      return { text: "" };
    }
    if (text.includes("\u0000")) return { text: "" };
    return { text: text.replace(/\r\n/g, "\n").trim() };
  }
}
