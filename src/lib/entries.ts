import { z } from "zod";
import type { EntryTitle, PageEntry } from "../types";
import { toPosix } from "./paths";

/** Reserved title that hides a page from the navigation tree */
export const HIDDEN_TITLE = "**HIDDEN**";

/** Error thrown when a page entry has the wrong shape */
export class MalformedEntryError extends Error {
  constructor(
    public index: number,
    public reason: string,
  ) {
    super(`Malformed page entry at position ${index}: ${reason}`);
    this.name = "MalformedEntryError";
  }
}

/** Error thrown when a page entry has no path */
export class MissingPathError extends Error {
  constructor(public index: number) {
    super(`Page entry at position ${index} has an empty path`);
    this.name = "MissingPathError";
  }
}

const optionalText = z.string().nullable().optional();

export const PageEntryObjectSchema = z.object({
  path: z.string(),
  title: optionalText,
  childTitle: optionalText,
  hidden: z.boolean().optional(),
});

export const RawPageEntrySchema = z.union([
  z.string(),
  z.array(z.string().nullable()),
  PageEntryObjectSchema,
]);

function titleFromText(text: string | null | undefined): EntryTitle | null {
  if (text === null || text === undefined) return null;
  if (text === HIDDEN_TITLE) return { kind: "hidden" };
  return { kind: "visible", text };
}

function checkPath(path: string | null | undefined, index: number): string {
  if (!path) {
    throw new MissingPathError(index);
  }
  return toPosix(path);
}

/**
 * Validate a single raw entry and convert it to its tagged form.
 * @param index - Position of the entry, used in error messages
 */
export function normalizeEntry(raw: unknown, index: number): PageEntry {
  const result = RawPageEntrySchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join("; ");
    throw new MalformedEntryError(index, reason);
  }

  const entry = result.data;

  if (typeof entry === "string") {
    return { path: checkPath(entry, index), title: null, childTitle: null };
  }

  if (Array.isArray(entry)) {
    if (entry.length < 1 || entry.length > 3) {
      throw new MalformedEntryError(
        index,
        `contained ${entry.length} items, expected 1, 2 or 3 strings`,
      );
    }
    const [path, title, childTitle] = entry;
    return {
      path: checkPath(path, index),
      title: titleFromText(title),
      childTitle: childTitle ?? null,
    };
  }

  // Object form has an explicit flag, so its title is never treated as the sentinel
  const title: EntryTitle | null = entry.hidden
    ? { kind: "hidden" }
    : entry.title != null
      ? { kind: "visible", text: entry.title }
      : null;
  // A hidden object entry displays its real title, carried as the child title
  const childTitle = entry.hidden
    ? (entry.title ?? entry.childTitle ?? null)
    : (entry.childTitle ?? null);
  return { path: checkPath(entry.path, index), title, childTitle };
}

/** Validate and normalize an ordered list of raw entries */
export function normalizeEntries(raw: readonly unknown[]): PageEntry[] {
  return raw.map((entry, index) => normalizeEntry(entry, index));
}
