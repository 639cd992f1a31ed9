export * from "./types.ts";
export * from "./builders.ts";
export * from "./errors.ts";
export * from "./entries.ts";
export * from "./generator.ts";
export * from "./logger.ts";
export * from "./sitemap-document.ts";
export * from "./sitemap-index-document.ts";
export * from "./writer.ts";
export { formatDateTime } from "./xml.ts";
