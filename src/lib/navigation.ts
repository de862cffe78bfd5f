import type { Header, NavItem, NavigationTree, Page, PageEntry } from "../types";
import { filenameToTitle, isHomepage, outputPath, urlPath } from "./paths";
import { createLogger } from "./log";

const log = createLogger("Navigation");

export interface BuildOptions {
  useDirectoryUrls: boolean;
  now?: Date;
}

/** Move the first homepage entry to the front, keeping everything else in order */
function homepageFirst(entries: readonly PageEntry[]): PageEntry[] {
  const index = entries.findIndex((entry) => isHomepage(entry.path));
  if (index <= 0) return [...entries];
  return [entries[index], ...entries.slice(0, index), ...entries.slice(index + 1)];
}

function createPage(
  title: string | null,
  path: string,
  hidden: boolean,
  options: BuildOptions,
  updateDate: string,
): Page {
  return {
    kind: "page",
    title,
    inputPath: path,
    outputPath: outputPath(path, options.useDirectoryUrls),
    absoluteUrl: urlPath(path, options.useDirectoryUrls),
    hidden,
    isHomepage: isHomepage(path),
    updateDate,
    previousPage: null,
    nextPage: null,
    ancestors: [],
  };
}

/**
 * Build the two-level navigation from an ordered list of entries.
 *
 * Returns the visible tree (`navItems`), every page in display order
 * including hidden ones (`pages`), and the header arena that
 * `Page.ancestors` indexes into.
 */
export function buildNavigation(
  entries: readonly PageEntry[],
  options: BuildOptions,
): NavigationTree {
  const navItems: NavItem[] = [];
  const pages: Page[] = [];
  const headers: Header[] = [];
  const updateDate = (options.now ?? new Date()).toISOString().slice(0, 10);

  let previous: Page | null = null;
  let hiddenPrevious: Page | null = null;

  for (const entry of homepageFirst(entries)) {
    const segments = entry.path.split("/");
    const hidden = entry.title?.kind === "hidden";

    let title: string | null = null;
    if (entry.title === null) {
      title = filenameToTitle(segments[0]);
    } else if (entry.title.kind === "visible") {
      title = entry.title.text;
    }

    let childTitle = entry.childTitle;
    if (childTitle === null && segments.length > 1) {
      childTitle = filenameToTitle(segments[1]);
    }

    let page: Page;
    const last = navItems.at(-1);

    if (hidden) {
      // Hidden pages stay out of the tree but keep a readable title
      const display = childTitle ?? filenameToTitle(segments[segments.length - 1]);
      page = createPage(display, entry.path, true, options, updateDate);
    } else if (!childTitle || title === null) {
      page = createPage(title, entry.path, false, options, updateDate);
      // Untitled pages and the homepage are linked but never listed
      if (page.title !== null && !page.isHomepage) {
        navItems.push(page);
      }
    } else if (last?.kind === "header" && last.title === title) {
      page = createPage(childTitle, entry.path, false, options, updateDate);
      last.children.push(page);
      page.ancestors = [last.id];
    } else {
      page = createPage(childTitle, entry.path, false, options, updateDate);
      const header: Header = { kind: "header", id: headers.length, title, children: [page] };
      headers.push(header);
      navItems.push(header);
      page.ancestors = [header.id];
    }

    if (previous) {
      page.previousPage = previous;
      previous.nextPage = page;
    }

    // A hidden page keeps a forward link across the gap it leaves
    if (hiddenPrevious) {
      hiddenPrevious.nextPage = page;
    }

    if (hidden) {
      hiddenPrevious = page;
    } else {
      hiddenPrevious = null;
      previous = page;
    }

    pages.push(page);
  }

  log.debug(
    `Built ${pages.length} pages, ${navItems.length} nav items, ${headers.length} headers`,
  );

  return { navItems, pages, headers };
}

function describePage(page: Page, depth: number, active: boolean): string {
  const indent = "    ".repeat(depth);
  const marker = active ? " [*]" : "";
  return `${indent}${page.title ?? "[blank]"} - ${page.absoluteUrl}${marker}\n`;
}

/**
 * Render an indented outline of the navigation, homepage first.
 * Active items are marked with `[*]`.
 */
export function describeNavigation(
  navItems: readonly NavItem[],
  homepage: Page | null,
  isActive: (item: NavItem) => boolean = () => false,
): string {
  let result =
    homepage && !navItems.includes(homepage) ? describePage(homepage, 0, isActive(homepage)) : "";

  for (const item of navItems) {
    if (item.kind === "page") {
      result += describePage(item, 0, isActive(item));
      continue;
    }
    result += `${item.title}${isActive(item) ? " [*]" : ""}\n`;
    for (const child of item.children) {
      result += describePage(child, 1, isActive(child));
    }
  }

  return result;
}
