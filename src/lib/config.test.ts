import { describe, it, expect, vi, afterEach } from "vitest";
import { ConfigError, repoNameFromUrl, resolveSiteConfig } from "./config";

describe("resolveSiteConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills defaults for a minimal config", () => {
    expect(resolveSiteConfig({ site_name: "Docs", pages: ["index.md"] })).toEqual({
      siteName: "Docs",
      pages: ["index.md"],
      siteUrl: null,
      siteDescription: null,
      siteAuthor: null,
      useDirectoryUrls: true,
      useAbsoluteUrls: false,
      repoUrl: null,
      repoName: null,
      includeNav: false,
      includeNextPrev: false,
      includeSitemap: true,
    });
  });

  it("enables nav and next/prev for multi-page sites", () => {
    const config = resolveSiteConfig({ site_name: "Docs", pages: ["index.md", "about.md"] });

    expect(config.includeNav).toBe(true);
    expect(config.includeNextPrev).toBe(true);
  });

  it("keeps explicit settings", () => {
    const config = resolveSiteConfig({
      site_name: "Docs",
      pages: ["index.md", ["about.md", "About"]],
      site_url: "https://docs.example.test/",
      use_absolute_urls: true,
      include_nav: false,
      include_sitemap: false,
    });

    expect(config.siteUrl).toBe("https://docs.example.test/");
    expect(config.useAbsoluteUrls).toBe(true);
    expect(config.includeNav).toBe(false);
    expect(config.includeNextPrev).toBe(true);
    expect(config.includeSitemap).toBe(false);
  });

  it("applies overrides on top of the user config", () => {
    const config = resolveSiteConfig(
      { site_name: "Docs", pages: ["index.md"], use_directory_urls: true },
      { use_directory_urls: false },
    );

    expect(config.useDirectoryUrls).toBe(false);
  });

  it("ignores unknown keys", () => {
    expect(() =>
      resolveSiteConfig({ site_name: "Docs", pages: [], theme: "readthedocs" }),
    ).not.toThrow();
  });

  it("warns when nav is forced on for a single page", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    resolveSiteConfig({ site_name: "Docs", pages: ["index.md"], include_nav: true });

    expect(warn).toHaveBeenCalledWith("[Config] include_nav is enabled but the site has only one page");
  });

  it("derives the repo name from the repo URL", () => {
    const config = resolveSiteConfig({
      site_name: "Docs",
      pages: [],
      repo_url: "https://github.com/example/docs",
    });

    expect(config.repoName).toBe("GitHub");
  });

  it("keeps an explicit repo name", () => {
    const config = resolveSiteConfig({
      site_name: "Docs",
      pages: [],
      repo_url: "https://github.com/example/docs",
      repo_name: "Source",
    });

    expect(config.repoName).toBe("Source");
  });

  it("requires a site name", () => {
    try {
      resolveSiteConfig({ pages: [] });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.issues).toEqual(["site_name: Required"]);
        expect(e.message).toBe("Invalid site config: site_name: Required");
      }
    }
  });

  it("rejects an empty site name", () => {
    expect(() => resolveSiteConfig({ site_name: "", pages: [] })).toThrow(
      "Invalid site config: site_name: Config must contain 'site_name' setting",
    );
  });

  it("accepts an SSH repo URL without deriving a name", () => {
    const config = resolveSiteConfig({
      site_name: "Docs",
      pages: ["index.md"],
      repo_url: "git@github.com:example/docs.git",
    });

    expect(config.repoUrl).toBe("git@github.com:example/docs.git");
    expect(config.repoName).toBeNull();
  });

  it("accepts a repo URL without a scheme", () => {
    const config = resolveSiteConfig({
      site_name: "Docs",
      pages: [],
      repo_url: "github.com/example/docs",
    });

    expect(config.repoUrl).toBe("github.com/example/docs");
    expect(config.repoName).toBeNull();
  });

  it("rejects a config that is not an object", () => {
    expect(() => resolveSiteConfig("site_name: Docs")).toThrow(ConfigError);
  });
});

describe("repoNameFromUrl", () => {
  it("names well-known hosts", () => {
    expect(repoNameFromUrl("https://github.com/example/docs")).toBe("GitHub");
    expect(repoNameFromUrl("https://bitbucket.com/example/docs")).toBe("Bitbucket");
  });

  it("title-cases the first label of other hosts", () => {
    expect(repoNameFromUrl("https://gitlab.com/example/docs")).toBe("Gitlab");
    expect(repoNameFromUrl("https://CODE.example.test:8443/docs")).toBe("Code");
    expect(repoNameFromUrl("https://my-forge.example.test/docs")).toBe("My-Forge");
  });

  it("returns null for URLs without a readable host", () => {
    expect(repoNameFromUrl("git@github.com:example/docs.git")).toBeNull();
    expect(repoNameFromUrl("not a url")).toBeNull();
  });
});
