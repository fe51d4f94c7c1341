// CHANGE: Project type allow-list, named presets and type filter resolution.
// WHY: Only allow-listed tags may reach the listing request; presets must be selectable one at a time.

import { ConfigurationError } from "./errors.js";
import { warn } from "./logger.js";

export const OPEN_SOURCE_TYPES = [
  "nuget",
  "paket",
  "cpp",
  "hex",
  "golangdep",
  "govendor",
  "gomodules",
  "maven",
  "gradle",
  "npm",
  "pnpm",
  "yarn",
  "composer",
  "pip",
  "pipenv",
  "poetry",
  "rubygems",
  "sbt",
  "cocoapods"
] as const;

export const IAC_TYPES = ["terraformconfig", "cloudformationconfig", "k8sconfig", "helmconfig", "armconfig"] as const;

export const CONTAINER_TYPES = ["apk", "deb", "rpm", "linux", "dockerfile"] as const;

/**
 * Every tag the listing endpoint accepts in its `types` parameter.
 */
export const PROJECT_TYPES = [...OPEN_SOURCE_TYPES, "sast", ...IAC_TYPES, ...CONTAINER_TYPES] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export type PresetName = "all" | "sca" | "iac" | "container";

export const PRESETS: Readonly<Record<PresetName, readonly ProjectType[]>> = {
  all: PROJECT_TYPES,
  sca: OPEN_SOURCE_TYPES,
  iac: IAC_TYPES,
  container: CONTAINER_TYPES
};

/**
 * Project types on which the server refuses a daily test frequency.
 */
const DAILY_RESTRICTED: ReadonlySet<string> = new Set<string>(["sast", ...IAC_TYPES]);

const ALLOWED: ReadonlySet<string> = new Set<string>(PROJECT_TYPES);

export function isProjectType(value: string): value is ProjectType {
  return ALLOWED.has(value);
}

export interface ParsedTypeList {
  readonly selected: readonly ProjectType[];
  readonly invalid: readonly string[];
}

/**
 * Split a comma-separated type list and validate it against the allow-list.
 *
 * @param input - Raw user input, e.g. `"npm, Maven,foo"`.
 * @returns Allow-listed tags in input order without duplicates, and the rejected ones.
 */
export function parseTypeList(input: string): ParsedTypeList {
  const selected: ProjectType[] = [];
  const invalid: string[] = [];
  for (const rawTag of input.split(",")) {
    const tag = rawTag.trim().toLowerCase();
    if (!tag) {
      continue;
    }
    if (isProjectType(tag)) {
      if (!selected.includes(tag)) {
        selected.push(tag);
      }
    } else if (!invalid.includes(tag)) {
      invalid.push(tag);
    }
  }
  return { selected, invalid };
}

/**
 * Filter sources the caller may combine. At most one of them may be set.
 */
export interface TypeSelection {
  readonly presets?: readonly PresetName[];
  readonly types?: string;
}

/**
 * Resolve presets or an explicit list into the filter sent to the listing endpoint.
 *
 * @returns Allow-listed tags; an empty array means no `types` parameter.
 * @throws ConfigurationError when more than one filter source is selected.
 */
export function resolveTypeFilter(selection: TypeSelection): readonly ProjectType[] {
  const presets = selection.presets ?? [];
  const explicit = selection.types?.trim() ? selection.types : undefined;
  const sources = presets.length + (explicit === undefined ? 0 : 1);
  if (sources > 1) {
    const names = presets.map(preset => `--${preset === "all" ? "all-types" : preset}`);
    if (explicit !== undefined) {
      names.push("--types");
    }
    throw new ConfigurationError(`Type filter options are mutually exclusive: ${names.join(", ")}.`);
  }
  const [preset] = presets;
  if (preset) {
    return [...PRESETS[preset]];
  }
  if (explicit === undefined) {
    return [];
  }
  const { selected, invalid } = parseTypeList(explicit);
  if (invalid.length > 0) {
    warn(`Ignoring invalid types: ${invalid.join(", ")}`);
  }
  if (selected.length === 0) {
    warn("No valid types selected. Fetching all project types.");
  }
  return selected;
}

/**
 * Tags in the filter that cannot be tested daily. An empty filter lists every type,
 * so all restricted tags apply.
 */
export function dailyRestrictedTypes(filter: readonly string[]): string[] {
  const candidates: readonly string[] = filter.length > 0 ? filter : PROJECT_TYPES;
  return candidates.filter(tag => DAILY_RESTRICTED.has(tag));
}
