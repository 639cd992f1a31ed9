import { XMLBuilder } from "fast-xml-parser";
import { InvalidArgumentError } from "./errors.ts";

export const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;

export const SITEMAP_NAMESPACE = "http://www.sitemaps.org/schemas/sitemap/0.9";
export const XSI_NAMESPACE = "http://www.w3.org/2001/XMLSchema-instance";

export type Element = { [name: string]: string | Element | Element[] };

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  textNodeName: "#text",
  format: false,
  suppressEmptyNode: false,
});

/**
 * Serialize a sitemaps.org root element (`urlset` or `sitemapindex`) with
 * its namespace and schema location attributes, followed by `children` as
 * repeated `child` elements.
 */
export function stringify(
  root: string,
  schema: string,
  child: string,
  children: readonly Element[],
): string {
  let xml = builder.build({
    [root]: {
      "@xmlns": SITEMAP_NAMESPACE,
      "@xmlns:xsi": XSI_NAMESPACE,
      "@xsi:schemaLocation": `${SITEMAP_NAMESPACE} ${SITEMAP_NAMESPACE}/${schema}`,
      [child]: [...children],
    },
  });
  return `${XML_DECLARATION}${xml}`;
}

/**
 * W3C date-time (https://www.w3.org/TR/NOTE-datetime) with seconds and a
 * numeric offset: `YYYY-MM-DDThh:mm:ss±hh:mm`. The offset defaults to the
 * local offset in effect at `date`.
 */
export function formatDateTime(
  date: Date,
  offset: number = -date.getTimezoneOffset(),
): string {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError("lastmod", "is not a valid date");
  }
  let local = new Date(date.getTime() + offset * 60_000);
  let year = local.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new InvalidArgumentError("lastmod", "must be within years 0000-9999");
  }
  let sign = offset < 0 ? "-" : "+";
  let minutes = Math.abs(offset);

  return [
    `${pad(year, 4)}-${pad(local.getUTCMonth() + 1)}-`,
    `${pad(local.getUTCDate())}T${pad(local.getUTCHours())}:`,
    `${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`,
    `${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`,
  ].join("");
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}
