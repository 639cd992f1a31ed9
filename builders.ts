import type { ChangeFreq, Loc, Priority, UrlEntry } from "./types.ts";

export function url(
  loc: Loc,
  lastmod?: Date,
  changefreq?: ChangeFreq,
  priority?: Priority,
): UrlEntry {
  return { loc, lastmod, changefreq, priority };
}
