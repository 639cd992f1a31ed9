import { InvalidArgumentError } from "./errors.ts";
import type { Loc, UrlOptions } from "./types.ts";
import { type Element, formatDateTime, stringify } from "./xml.ts";

/**
 * Accumulates `<url>` records for a single sitemap file. The builder does
 * not enforce the 50,000 url limit of the protocol; callers split their
 * entries across several documents.
 */
export class SitemapDocumentBuilder {
  readonly #urls: Element[] = [];

  get size(): number {
    return this.#urls.length;
  }

  /**
   * Append a url. Child elements are always emitted as `loc`, `lastmod`,
   * `changefreq`, `priority`, skipping the ones that were not given.
   */
  appendUrl(loc: Loc, options: UrlOptions = {}): void {
    if (typeof loc !== "string") {
      throw new InvalidArgumentError("loc");
    }
    let { lastmod, changefreq, priority } = options;

    let url: Element = { loc };
    if (lastmod !== undefined) {
      url.lastmod = formatDateTime(lastmod);
    }
    if (changefreq !== undefined) {
      url.changefreq = changefreq;
    }
    if (priority !== undefined) {
      url.priority = String(priority);
    }

    this.#urls.push(Object.freeze(url));
  }

  isEmpty(): boolean {
    return this.#urls.length === 0;
  }

  serialize(): string {
    return stringify("urlset", "sitemap.xsd", "url", this.#urls);
  }
}
