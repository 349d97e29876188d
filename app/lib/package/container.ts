import { resolveHref } from "./paths";

export const CONTAINER_PATH = "META-INF/container.xml";
export const MIMETYPE_PATH = "mimetype";
export const EPUB_MIMETYPE = "application/epub+zip";

export function containerXml(opfPath: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${opfPath}" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;
}

/**
 * Parse container.xml to find the OPF file path
 */
export function parseContainer(xml: string): string | null {
  const match = xml.match(/<rootfile\b[^>]*\bfull-path\s*=\s*["']([^"']+)["']/i);
  return match ? match[1] : null;
}

/**
 * Manifest item paths in OPF declaration order, resolved against the OPF location.
 * Regex-based so that store ordering does not depend on the document cache.
 */
export function manifestPaths(opfContent: string, opfPath: string): string[] {
  const paths: string[] = [];
  const manifest = opfContent.match(/<(?:opf:)?manifest\b[^>]*>([\s\S]*?)<\/(?:opf:)?manifest>/i);
  if (!manifest) return paths;

  for (const tagMatch of manifest[1].matchAll(/<(?:opf:)?item\s+([^>]+?)\/?>/gi)) {
    const hrefMatch = tagMatch[1].match(/\bhref\s*=\s*["']([^"']+)["']/i);
    if (!hrefMatch) continue;
    const resolved = resolveHref(hrefMatch[1], opfPath);
    if (resolved && !paths.includes(resolved)) paths.push(resolved);
  }
  return paths;
}
