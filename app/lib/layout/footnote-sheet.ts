import type { CheerioAPI } from "cheerio";
import type { PackageDocument } from "../epub/package-document";
import type { PackageStore } from "../package/store";
import type { PlatformProfile } from "./platforms";

export const FOOTNOTE_SHEET_NAME = "Styles/footnotes.css";

function rule(selector: string, declarations: string[]): string {
  return `${selector} {\n${declarations.map((line) => `  ${line};`).join("\n")}\n}\n`;
}

/** Styles for the platform's footnote reference and aside classes */
export function renderFootnoteSheet(profile: PlatformProfile): string {
  const rules = [
    `/* Footnotes: ${profile.platform} */\n`,
    rule(`a.${profile.anchorClass}`, [
      "text-decoration: none",
      "vertical-align: super",
      "font-size: 0.75em",
      "line-height: 1",
    ]),
  ];
  if (profile.icon) {
    rules.push(
      rule(`a.${profile.anchorClass} span.footnote-icon`, [
        "display: inline-block",
        "min-width: 1.2em",
        "padding: 0 0.2em",
        "border-radius: 0.6em",
        "background-color: #666",
        "color: #fff",
        "text-align: center",
      ]),
    );
  }
  rules.push(
    rule(`aside.${profile.asideClass}`, [
      "margin: 0.8em 0 0",
      "padding-top: 0.4em",
      "border-top: 1px solid #999",
      "font-size: 0.85em",
      "line-height: 1.4",
    ]),
  );
  return rules.join("\n");
}

export function hasFootnoteAsides($: CheerioAPI, profile: PlatformProfile): boolean {
  return (
    $("aside")
      .toArray()
      .filter((el) => (el.attribs.class ?? "").split(/\s+/).includes(profile.asideClass)).length > 0
  );
}

export async function writeFootnoteSheet(
  store: PackageStore,
  opf: PackageDocument,
  profile: PlatformProfile,
  sheetPath: string,
): Promise<void> {
  await store.put(sheetPath, renderFootnoteSheet(profile));
  if (!opf.itemByPath(sheetPath)) {
    opf.addItem(sheetPath, "text/css", { id: "footnotes" });
  }
}
