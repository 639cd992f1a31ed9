import type { Operation } from "effection";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { InvalidArgumentError } from "./errors.ts";
import { LoggerContext } from "./logger.ts";
import { SitemapDocumentBuilder } from "./sitemap-document.ts";
import { SitemapIndexDocumentBuilder } from "./sitemap-index-document.ts";
import type {
  FileWriter,
  SitemapGenerationSummary,
  UrlEntry,
  UrlOptions,
} from "./types.ts";
import { createFileSystemWriter } from "./writer.ts";

export const DEFAULT_MAX_ENTRIES_PER_SITEMAP = 50_000;
export const DEFAULT_MAX_SITEMAPS_PER_INDEX = 1_000;

export interface SitemapGeneratorOptions {
  /** Public url the sitemap file names are resolved against. */
  root: URL | string;
  entries: readonly UrlEntry[];
  maxEntriesPerSitemap?: number;
  maxSitemapsPerIndex?: number;
  writer?: FileWriter;
  /** Source of the `lastmod` stamped on every index record. */
  clock?: () => Date;
}

export interface SitemapGenerator {
  generate(dir: string): Operation<SitemapGenerationSummary>;
}

export function createSitemapGenerator(
  options: SitemapGeneratorOptions,
): SitemapGenerator {
  let {
    entries,
    maxEntriesPerSitemap = DEFAULT_MAX_ENTRIES_PER_SITEMAP,
    maxSitemapsPerIndex = DEFAULT_MAX_SITEMAPS_PER_INDEX,
    writer = createFileSystemWriter(),
    clock = () => new Date(),
  } = options;

  let root = parseRoot(options.root);
  if (!Array.isArray(entries)) {
    throw new InvalidArgumentError("entries");
  }
  assertLimit("maxEntriesPerSitemap", maxEntriesPerSitemap);
  assertLimit("maxSitemapsPerIndex", maxSitemapsPerIndex);

  return {
    *generate(dir) {
      let logger = yield* LoggerContext.expect();
      let summary: SitemapGenerationSummary = {
        sitemaps: [],
        indexes: [],
        urls: 0,
      };

      let index = new SitemapIndexDocumentBuilder();
      let sitemap = new SitemapDocumentBuilder();

      function* writeSitemap(): Operation<void> {
        let name = `sitemap${summary.sitemaps.length + 1}.xml.gz`;
        let content = gzipSync(Buffer.from(sitemap.serialize(), "utf8"));
        yield* writer.write(join(dir, name), content);

        index.appendSitemapUrl(new URL(name, root).toString(), clock());
        summary.sitemaps.push(name);
        summary.urls += sitemap.size;
        logger.info(`wrote ${name} with ${sitemap.size} urls`);
      }

      function* writeIndex(): Operation<void> {
        let name = `sitemapindex${summary.indexes.length + 1}.xml`;
        let content = Buffer.from(index.serialize(), "utf8");
        yield* writer.write(join(dir, name), content);

        summary.indexes.push(name);
        logger.info(`wrote ${name} with ${index.size} sitemaps`);
      }

      for (let i = 1; i <= entries.length; i++) {
        let entry = entries[i - 1];
        sitemap.appendUrl(entry.loc, effectiveOptions(entry));

        if (i % maxEntriesPerSitemap === 0) {
          yield* writeSitemap();

          if (summary.sitemaps.length % maxSitemapsPerIndex === 0) {
            yield* writeIndex();
            logger.debug(
              `sitemap index full after ${maxSitemapsPerIndex} sitemaps`,
            );
            index = new SitemapIndexDocumentBuilder();
          }

          sitemap = new SitemapDocumentBuilder();
        }
      }

      if (!sitemap.isEmpty()) {
        yield* writeSitemap();
      }

      if (!index.isEmpty()) {
        yield* writeIndex();
      }

      return summary;
    },
  };
}

/**
 * Every url is written with a change frequency and a priority. A priority
 * that is not positive becomes 1.
 */
export function effectiveOptions(entry: UrlEntry): UrlOptions {
  let changefreq = entry.changefreq ?? "always";
  let priority = entry.priority !== undefined && entry.priority > 0
    ? entry.priority
    : 1;

  if (entry.lastmod !== undefined) {
    return { lastmod: entry.lastmod, changefreq, priority };
  } else {
    return { changefreq, priority: 1 };
  }
}

function parseRoot(root: URL | string | undefined | null): URL {
  if (root instanceof URL) {
    return root;
  }
  if (typeof root !== "string") {
    throw new InvalidArgumentError("root");
  }
  try {
    return new URL(root);
  } catch {
    throw new InvalidArgumentError("root", `is not a valid url: ${root}`);
  }
}

function assertLimit(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(name, "must be a positive integer");
  }
}
