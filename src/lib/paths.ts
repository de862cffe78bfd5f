import { posix } from "node:path";

/** Normalize Windows separators so every path is POSIX-style */
export function toPosix(path: string): string {
  return path.replace(/\\/g, "/");
}

function stripExtension(path: string): string {
  const normalized = toPosix(path);
  const ext = posix.extname(normalized);
  return ext ? normalized.slice(0, -ext.length) : normalized;
}

/** `index.md` (at the docs root only) is the homepage */
export function isHomepage(path: string): boolean {
  return stripExtension(path) === "index";
}

/**
 * Map a source document to the HTML file it renders to.
 * "about.md" -> "about/index.html" (or "about.html" with flat URLs),
 * "api/index.md" -> "api/index.html".
 */
export function outputPath(path: string, useDirectoryUrls = true): string {
  const stem = stripExtension(path);
  if (posix.basename(stem) === "index" || !useDirectoryUrls) {
    return `${stem}.html`;
  }
  return `${stem}/index.html`;
}

/** Canonical absolute URL path for a source document */
export function urlPath(path: string, useDirectoryUrls = true): string {
  const url = "/" + outputPath(path, useDirectoryUrls);
  if (useDirectoryUrls && url.endsWith("index.html")) {
    return url.slice(0, -"index.html".length);
  }
  return url;
}

/**
 * Derive a human title from a path segment.
 * "getting-started.md" -> "Getting started", "API_Guide.md" -> "API Guide".
 */
export function filenameToTitle(filename: string): string {
  if (isHomepage(filename)) {
    return "Home";
  }

  const title = stripExtension(filename).replace(/[-_]/g, " ");
  // Only capitalize titles that were entirely lowercase
  if (title.toLowerCase() === title) {
    return title.charAt(0).toUpperCase() + title.slice(1);
  }
  return title;
}
