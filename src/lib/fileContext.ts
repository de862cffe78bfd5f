import { posix } from "node:path";
import { toPosix } from "./paths";

export interface FileContext {
  readonly currentFile: string | null;
  readonly basePath: string;
  setCurrentPath(path: string): void;
  makeAbsolute(path: string): string;
}

/**
 * Creates a context for resolving relative links between markdown sources,
 * e.g. `../guide.md` from `api/ref.md` resolves to `guide.md`.
 */
export function createFileContext(): FileContext {
  let currentFile: string | null = null;
  let basePath = "";

  return {
    get currentFile() {
      return currentFile;
    },

    get basePath() {
      return basePath;
    },

    setCurrentPath(path: string) {
      currentFile = toPosix(path);
      const dir = posix.dirname(currentFile);
      // Documents at the docs root have an empty base, as before any document is set
      basePath = dir === "." ? "" : dir;
    },

    makeAbsolute(path: string): string {
      return posix.normalize(posix.join(basePath, toPosix(path)));
    },
  };
}
