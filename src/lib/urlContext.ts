import { posix } from "node:path";

export interface UrlContext {
  readonly sitePath: string;
  readonly useAbsoluteUrls: boolean;
  readonly currentUrl: string | null;
  readonly basePath: string;
  setCurrentUrl(url: string): void;
  makeRelative(url: string): string;
}

/**
 * Directory part of a URL path, keeping the root.
 * "/api/ref/" -> "/api/ref", "/about.html" -> "/", "/" -> "/"
 */
export function urlDirectory(url: string): string {
  const head = url.slice(0, url.lastIndexOf("/") + 1);
  if (head && !/^\/+$/.test(head)) {
    return head.replace(/\/+$/, "");
  }
  return head;
}

/**
 * Creates a context that turns absolute URL paths into URLs relative to the
 * page currently being rendered, so a built site can be served from any prefix.
 */
export function createUrlContext(sitePath: string, useAbsoluteUrls = false): UrlContext {
  let currentUrl: string | null = null;
  let basePath = "/";

  return {
    sitePath,
    useAbsoluteUrls,

    get currentUrl() {
      return currentUrl;
    },

    get basePath() {
      return basePath;
    },

    setCurrentUrl(url: string) {
      currentUrl = url;
      basePath = urlDirectory(url);
    },

    makeRelative(url: string): string {
      if (useAbsoluteUrls) {
        return sitePath + url.replace(/^\/+/, "");
      }

      if (basePath === "/") {
        // Linking to the root from the root
        if (url === "/") return ".";
        return url.replace(/^\/+/, "");
      }

      const suffix = url.endsWith("/") && url.length > 1 ? "/" : "";
      const relative = posix.relative(basePath, url) || ".";
      return relative + suffix;
    },
  };
}
