import type { Header, NavItem, Page, RawPageEntry, SiteOptions } from "../types";
import { normalizeEntries } from "../lib/entries";
import { buildNavigation, describeNavigation } from "../lib/navigation";
import type { FileContext } from "../lib/fileContext";
import type { UrlContext } from "../lib/urlContext";
import type { SiteConfig } from "../lib/config";
import { createRenderState, type RenderState } from "./render";

export interface SiteNavigationOptions extends Partial<SiteOptions> {
  now?: Date;
}

/** One step of a render traversal */
export interface RenderStep {
  page: Page;
  index: number;
  /** URL of the page relative to itself ("." at the root, "./" for directory URLs) */
  url: string;
  previousUrl: string | null;
  nextUrl: string | null;
  state: RenderState;
}

export interface SiteNavigation {
  readonly navItems: readonly NavItem[];
  readonly pages: readonly Page[];
  readonly headers: readonly Header[];
  readonly homepage: Page | null;
  readonly useDirectoryUrls: boolean;
  readonly useAbsoluteUrls: boolean;
  /** Render state used when `walkPages` is called without one */
  readonly state: RenderState;
  readonly urlContext: UrlContext;
  readonly fileContext: FileContext;
  readonly sourceFiles: ReadonlySet<string>;
  ancestorsOf(page: Page): Header[];
  createRenderState(): RenderState;
  /**
   * Walk every page in display order. The state stays locked until the walk
   * finishes, breaks out of a loop, or is closed with `return()`; a generator
   * dropped after a partial `next()` keeps it locked until `state.reset()`.
   */
  walkPages(state?: RenderState): Generator<RenderStep, void, undefined>;
  toString(): string;
}

/**
 * Build the site navigation from raw page entries.
 *
 * Rendering walks the pages with `walkPages()`, which keeps the active page
 * and the URL/file contexts in step with the page being emitted. Renders
 * that run side by side each need their own `createRenderState()`.
 */
export function createSiteNavigation(
  entries: readonly RawPageEntry[],
  options: SiteNavigationOptions = {},
): SiteNavigation {
  const useDirectoryUrls = options.useDirectoryUrls ?? true;
  const useAbsoluteUrls = options.useAbsoluteUrls ?? false;
  const sitePath = options.siteUrl ?? "/";

  const { navItems, pages, headers } = buildNavigation(normalizeEntries(entries), {
    useDirectoryUrls,
    now: options.now,
  });

  let sourceFiles: Set<string> | null = null;

  function createState(): RenderState {
    return createRenderState({ sitePath, useAbsoluteUrls });
  }

  // Used by walks that bring no state of their own
  const state = createState();

  return {
    navItems,
    pages,
    headers,
    homepage: pages[0] ?? null,
    useDirectoryUrls,
    useAbsoluteUrls,
    state,
    urlContext: state.urlContext,
    fileContext: state.fileContext,

    get sourceFiles() {
      sourceFiles ??= new Set(pages.map((page) => page.inputPath));
      return sourceFiles;
    },

    ancestorsOf(page: Page) {
      return page.ancestors.map((id) => headers[id]);
    },

    createRenderState: createState,

    /** Yield each page in display order, marking it active while it renders */
    *walkPages(walkState: RenderState = state) {
      walkState.begin();
      try {
        for (const [index, page] of pages.entries()) {
          walkState.activate(page);
          yield {
            page,
            index,
            url: walkState.urlFor(page),
            previousUrl: page.previousPage ? walkState.urlFor(page.previousPage) : null,
            nextUrl: page.nextPage ? walkState.urlFor(page.nextPage) : null,
            state: walkState,
          };
        }
      } finally {
        walkState.activate(null);
        walkState.end();
      }
    },

    toString() {
      return describeNavigation(navItems, pages[0] ?? null);
    },
  };
}

/** Build the site navigation from a resolved site config */
export function navigationFromConfig(config: SiteConfig, now?: Date): SiteNavigation {
  return createSiteNavigation(config.pages, {
    siteUrl: config.siteUrl,
    useDirectoryUrls: config.useDirectoryUrls,
    useAbsoluteUrls: config.useAbsoluteUrls,
    now,
  });
}
