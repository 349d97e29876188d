import type { CheerioAPI } from "cheerio";
import { isDirective, isTag, isText, type AnyNode, type Element } from "domhandler";
import { PackageError } from "../errors";
import type { SerializationMode } from "../types";

export const XHTML_NS = "http://www.w3.org/1999/xhtml";
export const OPF_NS = "http://www.idpf.org/2007/opf";
export const OPS_NS = "http://www.idpf.org/2007/ops";
export const DC_NS = "http://purl.org/dc/elements/1.1/";

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const HTML5_DOCTYPE = "<!DOCTYPE html>";

const EXPECTED_ROOT: Record<Exclude<SerializationMode, "xml">, { name: string; ns: string }> = {
  package: { name: "package", ns: OPF_NS },
  markup: { name: "html", ns: XHTML_NS },
};

function localName(name: string): { prefix: string | null; local: string } {
  const idx = name.indexOf(":");
  return idx === -1
    ? { prefix: null, local: name }
    : { prefix: name.slice(0, idx), local: name.slice(idx + 1) };
}

export function rootElement($: CheerioAPI): Element | null {
  const roots = $.root().children().toArray();
  return roots.find(isTag) ?? null;
}

function ensureNamespaces($: CheerioAPI, root: Element, mode: SerializationMode, path: string): void {
  if (mode === "xml") return;

  const expected = EXPECTED_ROOT[mode];
  const { prefix, local } = localName(root.name);
  if (local !== expected.name) {
    throw new PackageError(
      "SerializationMismatch",
      `Cannot write <${root.name}> as ${mode}: expected <${expected.name}>`,
      { path },
    );
  }

  const nsAttr = prefix ? `xmlns:${prefix}` : "xmlns";
  const declared = root.attribs[nsAttr];
  if (declared === undefined) {
    root.attribs[nsAttr] = expected.ns;
  } else if (declared !== expected.ns) {
    throw new PackageError(
      "SerializationMismatch",
      `Cannot write ${mode} document with namespace "${declared}"`,
      { path },
    );
  }

  if (mode === "markup" && root.attribs["xmlns:epub"] === undefined && usesEpubPrefix($)) {
    root.attribs["xmlns:epub"] = OPS_NS;
  }
}

function usesEpubPrefix($: CheerioAPI): boolean {
  return $("*")
    .toArray()
    .some((el) => isTag(el) && Object.keys(el.attribs).some((name) => name.startsWith("epub:")));
}

function isBlankText(node: AnyNode): boolean {
  return isText(node) && node.data.trim() === "";
}

/**
 * Serialize a parsed document for the given mode.
 * package: XML declaration + <package> in the OPF namespace
 * markup:  XML declaration + HTML5 doctype + <html> in the XHTML namespace
 * xml:     XML declaration + any root
 */
export function serializeDocument($: CheerioAPI, mode: SerializationMode, path: string): string {
  const root = rootElement($);
  if (!root) {
    throw new PackageError("SerializationMismatch", "Document has no root element", { path });
  }
  ensureNamespaces($, root, mode, path);

  const body = $.root()
    .contents()
    .toArray()
    .filter((node) => !isDirective(node) && !isBlankText(node))
    .map((node) => $.xml(node))
    .join("\n");

  const prolog = mode === "markup" ? [XML_DECLARATION, HTML5_DOCTYPE] : [XML_DECLARATION];
  return `${prolog.join("\n")}\n${body}\n`;
}
