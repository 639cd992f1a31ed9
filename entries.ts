import { call, type Operation } from "effection";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { EntriesFileError } from "./errors.ts";
import { CHANGE_FREQUENCIES, type UrlEntry } from "./types.ts";

export const urlEntrySchema = z.object({
  loc: z.string(),
  lastmod: z.string().pipe(z.coerce.date()).optional(),
  changefreq: z.enum(CHANGE_FREQUENCIES).optional(),
  priority: z.number().min(0).max(1).optional(),
});

export const entriesSchema = z.array(urlEntrySchema);

export function parseEntries(path: string, text: string): UrlEntry[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new EntriesFileError(path, `invalid JSON (${String(error)})`);
  }

  let result = entriesSchema.safeParse(json);
  if (!result.success) {
    let [issue] = result.error.issues;
    throw new EntriesFileError(
      path,
      `${issue.path.join(".")}: ${issue.message}`,
    );
  }
  return result.data;
}

export function readEntries(path: string): Operation<UrlEntry[]> {
  return call(async () => parseEntries(path, await readFile(path, "utf8")));
}
