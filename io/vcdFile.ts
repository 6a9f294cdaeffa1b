/**
 * File-backed loading. Streams lines into the document builder.
 * Adapter only; the parse itself lives in domain/.
 */

import { createReadStream, promises as fs } from "node:fs";
import { createInterface } from "node:readline";
import { parseVcdStream, type ParseResult } from "../domain/document.js";
import { EmptyOrMissingInput } from "../domain/errors.js";
import { DEFAULT_MAX_BYTES } from "./config.js";

export interface LoadOptions {
  readonly maxBytes?: number;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function missing(message: string, file: string, extra: Record<string, unknown> = {}): ParseResult {
  return { ok: false, error: new EmptyOrMissingInput(message, { file, ...extra }), diagnostics: [] };
}

function unreadable(file: string, err: unknown): ParseResult | null {
  if (!isErrnoException(err)) return null;
  if (err.code === "ENOENT") return missing("VCD file not found", file, { code: err.code });
  return missing("VCD file could not be read", file, { code: err.code, cause: err.message });
}

/** Missing, unreadable, non-regular or oversized files yield EmptyOrMissingInput. */
export async function loadVcdFile(file: string, options: LoadOptions = {}): Promise<ParseResult> {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  let size: number;
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return missing("VCD path is not a file", file);
    size = stat.size;
  } catch (err: unknown) {
    const failed = unreadable(file, err);
    if (failed === null) throw err;
    return failed;
  }

  if (size > maxBytes) {
    return missing("VCD file exceeds size limit", file, { size, maxBytes });
  }

  const input = createReadStream(file, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    return await parseVcdStream(lines);
  } catch (err: unknown) {
    const failed = unreadable(file, err);
    if (failed === null) throw err;
    return failed;
  } finally {
    lines.close();
    input.destroy();
  }
}
