/**
 * Minimal style sheet model: enough structure to drop rules, canonicalize
 * declarations and read @font-face blocks. Comments are not preserved.
 */

export interface CssDeclaration {
  property: string;
  value: string;
}

export type CssBlock =
  | { type: "rule"; selector: string; declarations: CssDeclaration[] }
  | { type: "at-rule"; prelude: string; declarations: CssDeclaration[] }
  | { type: "group"; prelude: string; children: CssBlock[] }
  | { type: "statement"; text: string };

const GROUPING_RULES = /^@(media|supports|document|layer|container)\b/i;

export function stripComments(css: string): string {
  let out = "";
  let quote: string | null = null;
  for (let i = 0; i < css.length; i++) {
    const ch = css[i];
    if (quote) {
      out += ch;
      if (ch === "\\" && i + 1 < css.length) out += css[++i];
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === "/" && css[i + 1] === "*") {
      const end = css.indexOf("*/", i + 2);
      i = end === -1 ? css.length : end + 1;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    out += ch;
  }
  return out;
}

/**
 * Index of the first `stop` character at nesting depth 0, skipping quoted
 * strings and parenthesized groups; -1 when absent.
 */
function scanTo(text: string, start: number, stops: string): number {
  let quote: string | null = null;
  let parens = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "(") parens++;
    else if (ch === ")") parens = Math.max(0, parens - 1);
    else if (parens === 0 && stops.includes(ch)) return i;
  }
  return -1;
}

function matchingBrace(text: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const next = scanTo(text, i, "{}");
    if (next === -1) return text.length;
    depth += text[next] === "{" ? 1 : -1;
    if (depth === 0) return next;
    i = next + 1;
  }
  return text.length;
}

export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (;;) {
    const idx = scanTo(text, start, separator);
    if (idx === -1) {
      parts.push(text.slice(start));
      return parts;
    }
    parts.push(text.slice(start, idx));
    start = idx + 1;
  }
}

function canonicalValue(value: string): string {
  return value
    .replace(/\s+/g, " ")
    .replace(/\s*!\s*important$/i, " !important")
    .replace(/#[0-9a-f]{3,8}\b/gi, (hex) => hex.toLowerCase())
    .trim();
}

export function parseDeclarations(body: string): CssDeclaration[] {
  const declarations: CssDeclaration[] = [];
  for (const part of splitTopLevel(body, ";")) {
    const colon = part.indexOf(":");
    if (colon === -1) continue;
    const property = part.slice(0, colon).trim().toLowerCase();
    const value = canonicalValue(part.slice(colon + 1));
    if (!property || !value) continue;
    // exact repeats keep the last position; differing values are fallbacks
    const previous = declarations.findIndex((d) => d.property === property && d.value === value);
    if (previous !== -1) declarations.splice(previous, 1);
    declarations.push({ property, value });
  }
  return declarations;
}

function parseBlocks(text: string): CssBlock[] {
  const blocks: CssBlock[] = [];
  let i = 0;
  while (i < text.length) {
    const stop = scanTo(text, i, "{;");
    if (stop === -1) break;
    const prelude = text.slice(i, stop).replace(/\s+/g, " ").trim();

    if (text[stop] === ";") {
      if (prelude) blocks.push({ type: "statement", text: prelude });
      i = stop + 1;
      continue;
    }

    const close = matchingBrace(text, stop);
    const inner = text.slice(stop + 1, close);
    if (GROUPING_RULES.test(prelude)) {
      blocks.push({ type: "group", prelude, children: parseBlocks(inner) });
    } else if (prelude.startsWith("@")) {
      blocks.push({ type: "at-rule", prelude, declarations: parseDeclarations(inner) });
    } else if (prelude) {
      const selector = splitTopLevel(prelude, ",")
        .map((s) => s.trim())
        .filter(Boolean)
        .join(", ");
      blocks.push({ type: "rule", selector, declarations: parseDeclarations(inner) });
    }
    i = close + 1;
  }
  return blocks;
}

export function parseStylesheet(css: string): CssBlock[] {
  return parseBlocks(stripComments(css.replace(/^\uFEFF/, "")));
}

function serializeBlocks(blocks: CssBlock[], indent: string): string[] {
  const lines: string[] = [];
  for (const block of blocks) {
    switch (block.type) {
      case "statement":
        lines.push(`${indent}${block.text};`);
        break;
      case "group":
        lines.push(`${indent}${block.prelude} {`, ...serializeBlocks(block.children, `${indent}  `), `${indent}}`);
        break;
      case "rule":
      case "at-rule": {
        const head = block.type === "rule" ? block.selector : block.prelude;
        lines.push(
          `${indent}${head} {`,
          ...block.declarations.map((d) => `${indent}  ${d.property}: ${d.value};`),
          `${indent}}`,
        );
        break;
      }
    }
  }
  return lines;
}

export function serializeStylesheet(blocks: CssBlock[]): string {
  const lines = serializeBlocks(blocks, "");
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/** Family names from a font-family value, unquoted, in declared order */
export function fontFamilies(value: string): string[] {
  return splitTopLevel(value.replace(/\s*!important$/i, ""), ",")
    .map((name) => name.trim().replace(/^(["'])(.*)\1$/, "$2").trim())
    .filter(Boolean);
}

/** Every declaration in the sheet, descending into grouping rules */
export function allDeclarations(blocks: CssBlock[]): CssDeclaration[] {
  return blocks.flatMap((block) => {
    if (block.type === "group") return allDeclarations(block.children);
    if (block.type === "rule") return block.declarations;
    return [];
  });
}
