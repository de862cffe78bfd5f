import { derived, get, writable } from "svelte/store";
import type { Readable } from "svelte/store";
import type { Header, NavItem, Page } from "../types";
import { createFileContext, type FileContext } from "../lib/fileContext";
import { createUrlContext, type UrlContext } from "../lib/urlContext";

/** Error thrown when a render state is walked by two traversals at once */
export class TraversalInProgressError extends Error {
  constructor() {
    super("A page traversal is already in progress for this render state");
    this.name = "TraversalInProgressError";
  }
}

export interface RenderStateOptions {
  sitePath: string;
  useAbsoluteUrls: boolean;
}

/**
 * Per-render cursor: the page being rendered plus the URL and file contexts
 * that follow it. Subscribing yields the current page (or null between passes).
 */
export interface RenderState extends Readable<Page | null> {
  readonly urlContext: UrlContext;
  readonly fileContext: FileContext;
  readonly walking: boolean;
  activate(page: Page | null): void;
  isActive(item: NavItem): boolean;
  headerActive(header: Header): Readable<boolean>;
  urlFor(target: Page | string): string;
  resolveFile(relativePath: string): string;
  begin(): void;
  end(): void;
  /** Deactivate the current page and release a walk that was dropped mid-way */
  reset(): void;
}

export function createRenderState(options: RenderStateOptions): RenderState {
  const current = writable<Page | null>(null);
  const urlContext = createUrlContext(options.sitePath, options.useAbsoluteUrls);
  const fileContext = createFileContext();
  let walking = false;

  function isActive(item: NavItem): boolean {
    const page = get(current);
    if (!page) return false;
    if (item.kind === "page") return item === page;
    return page.ancestors.includes(item.id);
  }

  return {
    subscribe: current.subscribe,
    urlContext,
    fileContext,

    get walking() {
      return walking;
    },

    /** Make `page` the current page, deactivating the previous one */
    activate(page: Page | null) {
      current.set(page);
      if (page) {
        urlContext.setCurrentUrl(page.absoluteUrl);
        fileContext.setCurrentPath(page.inputPath);
      }
    },

    isActive,

    headerActive(header: Header) {
      return derived(current, ($current) => $current?.ancestors.includes(header.id) ?? false);
    },

    /** URL of a page (or absolute URL path) relative to the current page */
    urlFor(target: Page | string) {
      return urlContext.makeRelative(typeof target === "string" ? target : target.absoluteUrl);
    },

    resolveFile(relativePath: string) {
      return fileContext.makeAbsolute(relativePath);
    },

    begin() {
      if (walking) {
        throw new TraversalInProgressError();
      }
      walking = true;
    },

    end() {
      walking = false;
    },

    reset() {
      current.set(null);
      walking = false;
    },
  };
}
