import type { Operation } from "effection";

export interface UrlEntry {
  readonly loc: Loc;
  readonly lastmod?: Date;
  readonly changefreq?: ChangeFreq;
  readonly priority?: Priority;
}

export type UrlOptions = Omit<UrlEntry, "loc">;

export type Loc = string;

export const CHANGE_FREQUENCIES = [
  "always",
  "hourly",
  "daily",
  "weekly",
  "monthly",
  "yearly",
  "never",
] as const;

export type ChangeFreq = typeof CHANGE_FREQUENCIES[number];

/**
 * Relative importance of a url within its site, from 0.0 to 1.0
 */
export type Priority = number;

export interface FileWriter {
  write(path: string, content: Uint8Array): Operation<void>;
}

export interface SitemapGenerationSummary {
  sitemaps: string[];
  indexes: string[];
  urls: number;
}
