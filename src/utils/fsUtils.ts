import { copyFile, readdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";

export type TreeEntry = {
  // forward slashes relative to the walked root
  relPath: string;
  absPath: string;
  isDirectory: boolean;
  size: number;
};

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/**
 * Depth-first listing with entries sorted by name at every level; symlinks
 * are skipped.
 */
export async function walkTree(root: string): Promise<TreeEntry[]> {
  const out: TreeEntry[] = [];

  const visit = async (dir: string, rel: string): Promise<void> => {
    const dirents = await readdir(dir, { withFileTypes: true });
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const d of dirents) {
      const absPath = path.join(dir, d.name);
      const relPath = rel ? `${rel}/${d.name}` : d.name;
      if (d.isDirectory()) {
        out.push({ relPath, absPath, isDirectory: true, size: 0 });
        await visit(absPath, relPath);
      } else if (d.isFile()) {
        const st = await stat(absPath);
        out.push({ relPath, absPath, isDirectory: false, size: st.size });
      }
    }
  };

  await visit(root, "");
  return out;
}

export async function directorySize(root: string): Promise<number> {
  const entries = await walkTree(root);
  return entries.reduce((sum, e) => sum + e.size, 0);
}

/**
 * Resolves a forward-slash relative path below root matching each segment
 * case-insensitively. An exact-case match wins over other spellings.
 */
export async function findPathCaseInsensitive(
  root: string,
  relPath: string,
): Promise<string | null> {
  const segments = relPath.split(/[\\/]+/).filter((s) => s.length > 0);
  let current = root;
  for (const segment of segments) {
    const names = await readdir(current).catch((err: unknown) => {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return null;
      throw err;
    });
    if (!names) return null;
    const exact = names.find((n) => n === segment);
    const lower = segment.toLowerCase();
    const match = exact ?? names.find((n) => n.toLowerCase() === lower);
    if (!match) return null;
    current = path.join(current, match);
  }
  return current;
}

export async function isNonEmptyFile(p: string): Promise<boolean> {
  const st = await stat(p).catch(() => null);
  return !!st && st.isFile() && st.size > 0;
}

/**
 * Moves a file into place. Across devices the bytes are copied to a sibling
 * ".partial" name first so the destination never holds a truncated file.
 */
export async function moveFileAtomic(src: string, dest: string): Promise<void> {
  try {
    await rename(src, dest);
    return;
  } catch (err) {
    if (errorCode(err) !== "EXDEV") throw err;
  }

  const partial = `${dest}.partial`;
  try {
    await copyFile(src, partial);
    await rename(partial, dest);
  } catch (err) {
    await rm(partial, { force: true });
    throw err;
  }
  await rm(src, { force: true });
}
