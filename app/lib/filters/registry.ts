import type { FilterName } from "../types";
import { layoutFilter } from "../layout";
import { markupOptimize } from "./markup-optimize";
import { metadataNormalize } from "./metadata-normalize";
import { privacyScrub } from "./privacy-scrub";
import { structuralRepair } from "./structural-repair";
import { styleOptimize } from "./style-optimize";
import type { PackageFilter } from "./types";
import { versionUpgrade } from "./version-upgrade";

const FILTERS: Record<FilterName, PackageFilter> = {
  "structural-repair": structuralRepair,
  "version-upgrade": versionUpgrade,
  "privacy-scrub": privacyScrub,
  "metadata-normalize": metadataNormalize,
  "style-optimize": styleOptimize,
  "markup-optimize": markupOptimize,
  layout: layoutFilter,
};

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(FILTERS, name);
}

export function getFilter(name: string): PackageFilter | null {
  return isFilterName(name) ? FILTERS[name] : null;
}

export function listFilters(): PackageFilter[] {
  return Object.values(FILTERS);
}
