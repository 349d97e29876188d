import type { CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element, type Text } from "domhandler";

export const TRACKING_CLASS = "koboSpan";

const BLOCK_ELEMENTS = new Set([
  "body", "p", "div", "li", "dd", "dt", "td", "th", "caption", "h1", "h2", "h3", "h4", "h5",
  "h6", "blockquote", "figure", "figcaption", "pre", "section", "article", "aside", "header",
  "footer", "nav", "address", "table", "ul", "ol", "dl",
]);

const SKIPPED_ELEMENTS = new Set(["head", "script", "style", "svg", "math", "title"]);

const TERMINATOR = /[.!?。！？…]/;
const CLOSER = /[”’"'）)\]」』]/;

/**
 * Split a text run after sentence terminators. Joining the pieces gives back
 * the input; whitespace after a terminator stays with the preceding sentence.
 */
export function splitSentences(text: string): string[] {
  const pieces: string[] = [];
  let start = 0;
  let i = 0;
  while (i < text.length) {
    if (!TERMINATOR.test(text[i])) {
      i++;
      continue;
    }
    let end = i + 1;
    while (end < text.length && TERMINATOR.test(text[end])) end++;
    while (end < text.length && CLOSER.test(text[end])) end++;
    while (end < text.length && /\s/.test(text[end])) end++;
    pieces.push(text.slice(start, end));
    start = end;
    i = end;
  }
  if (start < text.length) pieces.push(text.slice(start));

  // punctuation-only pieces join the sentence before them
  const merged: string[] = [];
  for (const piece of pieces) {
    if (merged.length > 0 && !/[^\s.!?。！？…”’"'）)\]」』]/.test(piece)) {
      merged[merged.length - 1] += piece;
    } else {
      merged.push(piece);
    }
  }
  return merged;
}

function isTrackingSpan(el: Element): boolean {
  return el.name === "span" && (el.attribs.class ?? "").split(/\s+/).includes(TRACKING_CLASS);
}

function isNoteReference(el: Element): boolean {
  return el.name === "a" && (el.attribs["epub:type"] ?? "").split(/\s+/).includes("noteref");
}

type TrackedRun =
  | { kind: "text"; node: Text; block: Element }
  | { kind: "span"; span: Element; block: Element };

function collectRuns(node: AnyNode, block: Element, runs: TrackedRun[]): void {
  if (isText(node)) {
    if (node.data.trim() !== "") runs.push({ kind: "text", node, block });
    return;
  }
  if (!isTag(node)) return;
  if (isTrackingSpan(node)) {
    runs.push({ kind: "span", span: node, block });
    return;
  }
  if (SKIPPED_ELEMENTS.has(node.name) || isNoteReference(node)) return;
  const nextBlock = BLOCK_ELEMENTS.has(node.name) ? node : block;
  for (const child of node.children) collectRuns(child, nextBlock, runs);
}

/**
 * Wrap each sentence of the body text in `<span class="koboSpan"
 * id="kobo.P.S">`. P advances whenever the enclosing block changes and S
 * restarts at 1 with each new P. Spans already in the document are numbered
 * in the same pass, so ids always follow document order. Returns the number
 * of spans added.
 */
export function addTrackingSpans($: CheerioAPI): number {
  const body = $("body").get(0);
  if (!body) return 0;

  const runs: TrackedRun[] = [];
  collectRuns(body, body, runs);

  let paragraph = 0;
  let sentence = 0;
  let currentBlock: Element | null = null;
  let added = 0;

  for (const run of runs) {
    if (run.block !== currentBlock) {
      currentBlock = run.block;
      paragraph++;
      sentence = 0;
    }
    if (run.kind === "span") {
      sentence++;
      run.span.attribs.id = `kobo.${paragraph}.${sentence}`;
      continue;
    }
    const leading = run.node.data.match(/^\s*/)?.[0] ?? "";
    const spans = splitSentences(run.node.data.slice(leading.length)).map((piece) => {
      sentence++;
      added++;
      return `<span class="${TRACKING_CLASS}" id="kobo.${paragraph}.${sentence}">${piece}</span>`;
    });
    $(run.node).replaceWith(leading + spans.join(""));
  }
  return added;
}
