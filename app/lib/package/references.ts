import { entryKindOf, relativeHref, resolveHref, splitFragment } from "./paths";
import type { PackageStore } from "./store";

const ATTRIBUTE_REFERENCE = /\b(href|src|xlink:href|poster)(\s*=\s*)(["'])(.*?)\3/gi;
const CSS_URL_REFERENCE = /url\(\s*(["']?)([^"')]+)\1\s*\)/gi;

function rewriteReference(
  reference: string,
  originalPath: string,
  currentPath: string,
  renames: Map<string, string>,
): string {
  const target = resolveHref(reference, originalPath);
  if (!target) return reference;

  const renamed = renames.get(target);
  if (!renamed && originalPath === currentPath) return reference;

  const { fragment } = splitFragment(reference);
  return encodeURI(relativeHref(currentPath, renamed ?? target)) + fragment;
}

/**
 * Rewrite markup and style references after entries moved.
 * `renames` maps old entry paths to new ones; the moves must already be
 * applied to the store. Entries in `skip` are left byte-for-byte as they are.
 * Returns the paths of entries that were rewritten.
 */
export async function rewriteReferences(
  store: PackageStore,
  renames: Map<string, string>,
  skip: ReadonlySet<string> = new Set(),
): Promise<string[]> {
  if (renames.size === 0) return [];

  const originalOf = new Map<string, string>();
  for (const [from, to] of renames) originalOf.set(to, from);

  const rewritten: string[] = [];
  for (const path of await store.list()) {
    if (skip.has(path) || entryKindOf(path) === "binary" || path === "mimetype" || path.startsWith("META-INF/")) {
      continue;
    }
    const originalPath = originalOf.get(path) ?? path;
    const content = (await store.get(path)).toString("utf8");

    let updated = content.replace(
      ATTRIBUTE_REFERENCE,
      (_match, name: string, eq: string, quote: string, value: string) =>
        `${name}${eq}${quote}${rewriteReference(value, originalPath, path, renames)}${quote}`,
    );
    updated = updated.replace(
      CSS_URL_REFERENCE,
      (_match, quote: string, value: string) =>
        `url(${quote}${rewriteReference(value.trim(), originalPath, path, renames)}${quote})`,
    );

    if (updated !== content) {
      await store.put(path, updated);
      rewritten.push(path);
    }
  }
  return rewritten;
}
