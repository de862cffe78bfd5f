import { z } from "zod";
import { RawPageEntrySchema } from "./entries";
import { createLogger } from "./log";

const log = createLogger("Config");

/** Error thrown when the site config is invalid */
export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const SiteConfigSchema = z.object({
  site_name: z.string().min(1, "Config must contain 'site_name' setting"),
  pages: z.array(RawPageEntrySchema),
  site_url: z.string().nullable().default(null),
  site_description: z.string().nullable().default(null),
  site_author: z.string().nullable().default(null),
  // `<page>/index.html` files linked as directories, vs `<page>.html`
  use_directory_urls: z.boolean().default(true),
  use_absolute_urls: z.boolean().default(false),
  repo_url: z.string().nullable().default(null),
  repo_name: z.string().nullable().default(null),
  include_nav: z.boolean().nullable().default(null),
  include_next_prev: z.boolean().nullable().default(null),
  include_sitemap: z.boolean().default(true),
});

export type UserSiteConfig = z.input<typeof SiteConfigSchema>;

export interface SiteConfig {
  siteName: string;
  pages: z.infer<typeof SiteConfigSchema>["pages"];
  siteUrl: string | null;
  siteDescription: string | null;
  siteAuthor: string | null;
  useDirectoryUrls: boolean;
  useAbsoluteUrls: boolean;
  repoUrl: string | null;
  repoName: string | null;
  includeNav: boolean;
  includeNextPrev: boolean;
  includeSitemap: boolean;
}

function titleCase(text: string): string {
  return text.replace(/[a-z]+/gi, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Label for a repository link.
 * "https://github.com/org/repo" -> "GitHub", "https://gitlab.com/x" -> "Gitlab".
 * Returns null when the URL has no host to read, e.g. "git@github.com:org/repo.git".
 */
export function repoNameFromUrl(repoUrl: string): string | null {
  let host: string;
  try {
    host = new URL(repoUrl).host.toLowerCase();
  } catch {
    return null;
  }
  switch (host) {
    case "":
      return null;
    case "github.com":
      return "GitHub";
    case "bitbucket.com":
      return "Bitbucket";
    default:
      return titleCase(host.split(".")[0]);
  }
}

/**
 * Validate an already-parsed user config, fill in defaults and derive the
 * values the navigation needs.
 * @param options - Overrides applied on top of the user config
 */
export function resolveSiteConfig(userConfig: unknown, options: Record<string, unknown> = {}): SiteConfig {
  const merged =
    typeof userConfig === "object" && userConfig !== null ? { ...userConfig, ...options } : userConfig;

  const result = SiteConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigError(`Invalid site config: ${issues.join("; ")}`, issues);
  }

  const config = result.data;
  const multiPage = config.pages.length > 1;

  if (config.include_nav && !multiPage) {
    log.warn("include_nav is enabled but the site has only one page");
  }
  if (config.include_next_prev && !multiPage) {
    log.warn("include_next_prev is enabled but the site has only one page");
  }

  return {
    siteName: config.site_name,
    pages: config.pages,
    siteUrl: config.site_url,
    siteDescription: config.site_description,
    siteAuthor: config.site_author,
    useDirectoryUrls: config.use_directory_urls,
    useAbsoluteUrls: config.use_absolute_urls,
    repoUrl: config.repo_url,
    repoName:
      config.repo_name ?? (config.repo_url !== null ? repoNameFromUrl(config.repo_url) : null),
    includeNav: config.include_nav ?? multiPage,
    includeNextPrev: config.include_next_prev ?? multiPage,
    includeSitemap: config.include_sitemap,
  };
}
