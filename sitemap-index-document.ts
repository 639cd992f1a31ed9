import { InvalidArgumentError } from "./errors.ts";
import type { Loc } from "./types.ts";
import { type Element, formatDateTime, stringify } from "./xml.ts";

export class SitemapIndexDocumentBuilder {
  readonly #sitemaps: Element[] = [];

  get size(): number {
    return this.#sitemaps.length;
  }

  appendSitemapUrl(loc: Loc, lastmod?: Date): void {
    if (typeof loc !== "string") {
      throw new InvalidArgumentError("loc");
    }

    let sitemap: Element = lastmod === undefined
      ? { loc }
      : { loc, lastmod: formatDateTime(lastmod) };

    this.#sitemaps.push(Object.freeze(sitemap));
  }

  isEmpty(): boolean {
    return this.#sitemaps.length === 0;
  }

  serialize(): string {
    return stringify("sitemapindex", "siteindex.xsd", "sitemap", this.#sitemaps);
  }
}
