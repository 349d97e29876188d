import type { Cheerio, CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import { escapeXml, unescapeXml } from "../document/xml-text";
import type { PlatformProfile } from "./platforms";

const BLOCK_SELECTOR =
  "p, div, li, dd, dt, td, th, h1, h2, h3, h4, h5, h6, blockquote, figure, figcaption, pre, section, article, aside";

function hasEpubType(el: Element, type: string): boolean {
  return (el.attribs["epub:type"] ?? "").split(/\s+/).includes(type);
}

function isBlank(node: AnyNode): boolean {
  return isText(node) && node.data.trim() === "";
}

function findById($: CheerioAPI, id: string): Cheerio<Element> {
  return $.root()
    .find("*")
    .filter((_, el) => el.attribs.id === id)
    .first();
}

/** Remove ancestors left without content by moving a note body out */
function pruneEmptyAncestors($: CheerioAPI, parent: Element | null): void {
  let current = parent;
  while (current && current.name !== "body" && current.children.every(isBlank)) {
    const next = current.parent;
    $(current).remove();
    current = next && isTag(next) ? next : null;
  }
}

function anchorContent(profile: PlatformProfile, n: number): string {
  return profile.icon ? `<span class="footnote-icon">${n}</span>` : `<sup>${n}</sup>`;
}

/**
 * Rewrite each noteref anchor whose target is in the same document into an
 * `A_n` / `B_n` anchor and aside pair. The aside follows the block holding
 * the anchor. Returns the number of notes paired.
 */
export function restructureFootnotes($: CheerioAPI, profile: PlatformProfile): number {
  const anchors = $("a")
    .toArray()
    .filter((el) => hasEpubType(el, "noteref"));

  const lastInserted = new Map<Element, Cheerio<Element>>();
  let n = 0;

  for (const el of anchors) {
    const href = unescapeXml(el.attribs.href ?? "");
    if (!href.startsWith("#") || href.length < 2) continue;
    const target = findById($, href.slice(1));
    const targetEl = target.get(0);
    if (!targetEl || targetEl === el || $.contains(targetEl, el)) {
      console.warn(`[Layout] Footnote target ${href} not found`);
      continue;
    }

    const anchor = $(el);
    const blockEl = anchor.closest(BLOCK_SELECTOR).get(0) ?? el.parent;
    if (!blockEl || !isTag(blockEl)) continue;

    n++;
    const oldAnchorId = el.attribs.id;
    const aside = $(
      `<aside epub:type="footnote" id="B_${n}" class="${escapeXml(profile.asideClass)}"></aside>`,
    ).filter((_, node): node is Element => isTag(node));
    aside.append(target.contents());

    // links back to the reference follow its new id
    if (oldAnchorId) {
      aside
        .find("a")
        .filter((_, link) => unescapeXml(link.attribs.href ?? "") === `#${oldAnchorId}`)
        .attr("href", `#A_${n}`);
    }

    const targetParent = targetEl.parent;
    target.remove();
    pruneEmptyAncestors($, targetParent && isTag(targetParent) ? targetParent : null);

    anchor.attr("id", `A_${n}`);
    anchor.attr("href", `#B_${n}`);
    anchor.attr("class", profile.anchorClass);
    anchor.html(anchorContent(profile, n));

    const after = lastInserted.get(blockEl) ?? $(blockEl);
    after.after(aside);
    lastInserted.set(blockEl, aside);
  }
  return n;
}
