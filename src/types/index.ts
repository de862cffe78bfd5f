/** Object form of a page entry, as it may appear in a site config */
export interface PageEntryObject {
  path: string;
  title?: string | null;
  childTitle?: string | null;
  hidden?: boolean;
}

/**
 * A user-authored page entry before validation: a bare path, a
 * `[path, title?, childTitle?]` tuple, or an object.
 */
export type RawPageEntry = string | ReadonlyArray<string | null> | PageEntryObject;

export type EntryTitle = { kind: "visible"; text: string } | { kind: "hidden" };

/** Validated page entry */
export interface PageEntry {
  path: string;
  title: EntryTitle | null;
  childTitle: string | null;
}

/** Index of a header in the navigation's header arena */
export type HeaderId = number;

/** A single rendered document */
export interface Page {
  kind: "page";
  title: string | null;
  inputPath: string;
  outputPath: string;
  absoluteUrl: string;
  hidden: boolean;
  isHomepage: boolean;
  updateDate: string; // YYYY-MM-DD
  previousPage: Page | null;
  nextPage: Page | null;
  ancestors: readonly HeaderId[];
}

/** A group of second-level pages */
export interface Header {
  kind: "header";
  id: HeaderId;
  title: string;
  children: Page[];
}

/** Top-level navigation item */
export type NavItem = Page | Header;

/** Built navigation */
export interface NavigationTree {
  navItems: NavItem[];
  pages: Page[];
  headers: Header[];
}

/** Settings the navigation consumes from the site config */
export interface SiteOptions {
  siteUrl: string | null;
  useDirectoryUrls: boolean;
  useAbsoluteUrls: boolean;
}
