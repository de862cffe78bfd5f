export type {
  EntryTitle,
  Header,
  HeaderId,
  NavItem,
  NavigationTree,
  Page,
  PageEntry,
  PageEntryObject,
  RawPageEntry,
  SiteOptions,
} from "./types";
export { filenameToTitle, isHomepage, outputPath, urlPath } from "./lib/paths";
export {
  HIDDEN_TITLE,
  MalformedEntryError,
  MissingPathError,
  normalizeEntries,
  normalizeEntry,
} from "./lib/entries";
export { buildNavigation, describeNavigation, type BuildOptions } from "./lib/navigation";
export { createUrlContext, urlDirectory, type UrlContext } from "./lib/urlContext";
export { createFileContext, type FileContext } from "./lib/fileContext";
export {
  ConfigError,
  repoNameFromUrl,
  resolveSiteConfig,
  type SiteConfig,
  type UserSiteConfig,
} from "./lib/config";
export { createLogger, type Logger } from "./lib/log";
export {
  createRenderState,
  TraversalInProgressError,
  type RenderState,
  type RenderStateOptions,
} from "./stores/render";
export {
  createSiteNavigation,
  navigationFromConfig,
  type RenderStep,
  type SiteNavigation,
  type SiteNavigationOptions,
} from "./stores/navigation";
