import {
  parseStylesheet,
  serializeStylesheet,
  splitTopLevel,
  type CssBlock,
} from "../document/css";
import type { DocumentCache } from "../document/cache";
import { extensionOf } from "../package/paths";
import type { PackageStore } from "../package/store";
import { NO_OPTIONS, type PackageFilter } from "./types";

const MARKUP_DOCUMENT = new Set([".xhtml", ".html", ".htm"]);

interface UsedNames {
  classes: Set<string>;
  ids: Set<string>;
}

async function collectUsedNames(store: PackageStore, cache: DocumentCache): Promise<UsedNames> {
  const used: UsedNames = { classes: new Set(), ids: new Set() };
  for (const path of await store.list()) {
    if (!MARKUP_DOCUMENT.has(extensionOf(path))) continue;
    const { $ } = await cache.readXml(path);
    $.root()
      .find("*")
      .each((_, el) => {
        (el.attribs.class ?? "").split(/\s+/).filter(Boolean).forEach((c) => used.classes.add(c));
        if (el.attribs.id) used.ids.add(el.attribs.id);
      });
  }
  return used;
}

/**
 * Whether every class and id a selector names occurs in the markup.
 * Attribute selectors and functional pseudo-class arguments are ignored.
 */
export function selectorMatches(selector: string, used: UsedNames): boolean {
  const simplified = selector.replace(/\[[^\]]*\]/g, "").replace(/\([^)]*\)/g, "");
  for (const [, name] of simplified.matchAll(/\.(-?[A-Za-z_][\w-]*)/g)) {
    if (!used.classes.has(name)) return false;
  }
  for (const [, name] of simplified.matchAll(/#(-?[A-Za-z_][\w-]*)/g)) {
    if (!used.ids.has(name)) return false;
  }
  return true;
}

export function pruneBlocks(blocks: CssBlock[], used: UsedNames): CssBlock[] {
  const kept: CssBlock[] = [];
  for (const block of blocks) {
    if (block.type === "group") {
      const children = pruneBlocks(block.children, used);
      if (children.length > 0) kept.push({ ...block, children });
    } else if (block.type === "rule") {
      if (block.declarations.length === 0) continue;
      const selectors = splitTopLevel(block.selector, ",")
        .map((s) => s.trim())
        .filter((s) => s && selectorMatches(s, used));
      if (selectors.length > 0) kept.push({ ...block, selector: selectors.join(", ") });
    } else if (block.type === "at-rule") {
      if (block.declarations.length > 0) kept.push(block);
    } else {
      kept.push(block);
    }
  }
  return kept;
}

export const styleOptimize: PackageFilter = {
  name: "style-optimize",
  description: "Removes unused style rules and canonicalizes declarations",
  optionsSchema: NO_OPTIONS,
  async run({ store, cache }) {
    const used = await collectUsedNames(store, cache);
    for (const path of await store.list()) {
      if (extensionOf(path) !== ".css") continue;
      const original = (await store.get(path)).toString("utf8");
      const optimized = serializeStylesheet(pruneBlocks(parseStylesheet(original), used));
      if (optimized !== original) {
        await store.put(path, optimized);
        console.log(`[Style] Rewrote ${path}`);
      }
    }
  },
};
