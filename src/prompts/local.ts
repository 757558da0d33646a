import { readFile } from "node:fs/promises";
import { join } from "node:path";

const EXTENSIONS = [".txt", ".md"] as const;

/** Default instructions kept on disk as `{role}.txt` or `{role}.md`. */
export class LocalPromptDirectory {
  constructor(readonly dir: string) {}

  /** Trimmed file text, or undefined when no non-empty file exists. */
  async read(role: string): Promise<{ text: string; path: string } | undefined> {
    for (const ext of EXTENSIONS) {
      const path = join(this.dir, `${role}${ext}`);
      let content: string;
      try {
        content = await readFile(path, "utf-8");
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") continue;
        throw err;
      }
      const text = content.trim();
      if (text) return { text, path };
    }
    return undefined;
  }
}
