import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors.ts";
import { SitemapDocumentBuilder } from "../sitemap-document.ts";
import { SitemapIndexDocumentBuilder } from "../sitemap-index-document.ts";
import { formatDateTime } from "../xml.ts";

const DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;
const NAMESPACES =
  `xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"`;

const URLSET =
  `<urlset ${NAMESPACES} xsi:schemaLocation="http://www.sitemaps.org/schemas/sitemap/0.9 http://www.sitemaps.org/schemas/sitemap/0.9/sitemap.xsd">`;

const SITEMAPINDEX =
  `<sitemapindex ${NAMESPACES} xsi:schemaLocation="http://www.sitemaps.org/schemas/sitemap/0.9 http://www.sitemaps.org/schemas/sitemap/0.9/siteindex.xsd">`;

describe("SitemapDocumentBuilder", () => {
  it("starts out empty", () => {
    let sitemap = new SitemapDocumentBuilder();
    expect(sitemap.isEmpty()).toEqual(true);
    expect(sitemap.size).toEqual(0);
  });

  it("serializes a url with only a location", () => {
    let sitemap = new SitemapDocumentBuilder();
    sitemap.appendUrl("https://example.com/");

    expect(sitemap.isEmpty()).toEqual(false);
    expect(sitemap.serialize()).toEqual(
      `${DECLARATION}${URLSET}<url><loc>https://example.com/</loc></url></urlset>`,
    );
  });

  it("emits optional fields in a fixed order", () => {
    let lastmod = new Date(2024, 0, 1, 12, 30, 0);
    let sitemap = new SitemapDocumentBuilder();
    sitemap.appendUrl("https://example.com/about", {
      priority: 0.8,
      changefreq: "weekly",
      lastmod,
    });

    expect(sitemap.serialize()).toEqual(
      `${DECLARATION}${URLSET}<url><loc>https://example.com/about</loc>` +
        `<lastmod>${formatDateTime(lastmod)}</lastmod>` +
        `<changefreq>weekly</changefreq><priority>0.8</priority></url></urlset>`,
    );
  });

  it("supports any subset of the optional fields", () => {
    let sitemap = new SitemapDocumentBuilder();
    sitemap.appendUrl("https://example.com/a", { changefreq: "never" });
    sitemap.appendUrl("https://example.com/b", { priority: 0.25 });
    sitemap.appendUrl("https://example.com/c", {
      changefreq: "hourly",
      priority: 1,
    });

    expect(sitemap.size).toEqual(3);
    expect(sitemap.serialize()).toEqual(
      `${DECLARATION}${URLSET}` +
        `<url><loc>https://example.com/a</loc><changefreq>never</changefreq></url>` +
        `<url><loc>https://example.com/b</loc><priority>0.25</priority></url>` +
        `<url><loc>https://example.com/c</loc><changefreq>hourly</changefreq><priority>1</priority></url>` +
        `</urlset>`,
    );
  });

  it("escapes xml special characters in locations", () => {
    let sitemap = new SitemapDocumentBuilder();
    sitemap.appendUrl("https://example.com/?a=1&b=<2>");

    expect(sitemap.serialize()).toEqual(
      `${DECLARATION}${URLSET}<url><loc>https://example.com/?a=1&amp;b=&lt;2&gt;</loc></url></urlset>`,
    );
  });

  it("serializes identically when called twice", () => {
    let sitemap = new SitemapDocumentBuilder();
    sitemap.appendUrl("https://example.com/", { changefreq: "daily" });

    expect(sitemap.serialize()).toEqual(sitemap.serialize());
  });

  it("rejects a missing location without touching the document", () => {
    let sitemap = new SitemapDocumentBuilder();

    // @ts-expect-error loc is required
    expect(() => sitemap.appendUrl(null)).toThrow(InvalidArgumentError);
    expect(sitemap.isEmpty()).toEqual(true);
  });

  it("rejects an invalid lastmod without touching the document", () => {
    let sitemap = new SitemapDocumentBuilder();

    expect(() =>
      sitemap.appendUrl("https://example.com/", { lastmod: new Date(NaN) })
    ).toThrow("lastmod is not a valid date");
    expect(sitemap.isEmpty()).toEqual(true);
  });
});

describe("SitemapIndexDocumentBuilder", () => {
  it("starts out empty", () => {
    let index = new SitemapIndexDocumentBuilder();
    expect(index.isEmpty()).toEqual(true);
    expect(index.size).toEqual(0);
  });

  it("serializes sitemap references with and without lastmod", () => {
    let lastmod = new Date(2024, 2, 1, 10, 15, 0);
    let index = new SitemapIndexDocumentBuilder();
    index.appendSitemapUrl("https://example.com/sitemap1.xml.gz", lastmod);
    index.appendSitemapUrl("https://example.com/sitemap2.xml.gz");

    expect(index.size).toEqual(2);
    expect(index.serialize()).toEqual(
      `${DECLARATION}${SITEMAPINDEX}` +
        `<sitemap><loc>https://example.com/sitemap1.xml.gz</loc>` +
        `<lastmod>${formatDateTime(lastmod)}</lastmod></sitemap>` +
        `<sitemap><loc>https://example.com/sitemap2.xml.gz</loc></sitemap>` +
        `</sitemapindex>`,
    );
  });

  it("serializes identically when called twice", () => {
    let index = new SitemapIndexDocumentBuilder();
    index.appendSitemapUrl("https://example.com/sitemap1.xml.gz");

    expect(index.serialize()).toEqual(index.serialize());
  });

  it("rejects a missing location without touching the document", () => {
    let index = new SitemapIndexDocumentBuilder();

    // @ts-expect-error loc is required
    expect(() => index.appendSitemapUrl(undefined)).toThrow("loc is required");
    expect(index.isEmpty()).toEqual(true);
  });
});
