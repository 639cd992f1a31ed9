import { main } from "effection";
import { parser } from "zod-opts";
import { z } from "zod";
import { readEntries } from "./entries.ts";
import {
  createSitemapGenerator,
  DEFAULT_MAX_ENTRIES_PER_SITEMAP,
  DEFAULT_MAX_SITEMAPS_PER_INDEX,
} from "./generator.ts";
import { LoggerContext } from "./logger.ts";

const url = () =>
  z.string().refine((str) => str.match(/^http/), {
    message: `must be a hypertext (http) url`,
  });

const limit = (value: number) => z.number().int().positive().default(value);

await main(function* (args) {
  let options = parser()
    .name("sitemapgen")
    .description(
      "Write gzipped sitemap files and sitemap index files for a list of urls",
    )
    .version("0.0.0")
    .options({
      entries: {
        alias: "e",
        type: z.string(),
        description:
          "JSON file with an array of { loc, lastmod?, changefreq?, priority? }",
      },
      "root-url": {
        alias: "r",
        type: url(),
        description:
          "Public URL the sitemap files are served from. E.g. https://example.com/",
      },
      outputdir: {
        type: z.string().default("dist"),
        description: "Directory to place the generated files",
        alias: "o",
      },
      "max-entries": {
        type: limit(DEFAULT_MAX_ENTRIES_PER_SITEMAP),
        description: "Maximum number of urls in a sitemap file",
      },
      "max-sitemaps": {
        type: limit(DEFAULT_MAX_SITEMAPS_PER_INDEX),
        description: "Maximum number of sitemaps in a sitemap index file",
      },
    })
    .parse(args);

  let logger = yield* LoggerContext.expect();
  let entries = yield* readEntries(options.entries);

  let generator = createSitemapGenerator({
    root: options["root-url"],
    entries,
    maxEntriesPerSitemap: options["max-entries"],
    maxSitemapsPerIndex: options["max-sitemaps"],
  });

  let summary = yield* generator.generate(options.outputdir);

  logger.info(
    `${summary.urls} urls in ${summary.sitemaps.length} sitemaps and ${summary.indexes.length} indexes`,
  );
});
