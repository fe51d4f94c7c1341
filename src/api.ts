// CHANGE: Listing with cursor pagination and the per-project frequency update call.
// WHY: Listing is all-or-nothing; an update call reports its outcome as a value and never throws for HTTP failures.

import axios, { type AxiosInstance } from "axios";
import type { Settings, ApiSettings } from "./config.js";
import { FetchError, UpdateError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import type { Frequency, JsonObject, JsonValue, Project, ProjectPage, UpdateOutcome } from "./types.js";
import { describeHttpError, normaliseHeaders, serialised, sleep } from "./utils/http.js";
import { displayPath, projectUrl, projectsUrl, resolveNextUrl } from "./utils/url.js";

const UNKNOWN_NAME = "Unknown Name";

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toProject(raw: JsonObject): Project {
  const attributes: JsonObject = isRecord(raw.attributes) ? raw.attributes : {};
  return {
    id: typeof raw.id === "string" && raw.id.trim() !== "" ? raw.id : undefined,
    name: typeof attributes.name === "string" ? attributes.name : UNKNOWN_NAME,
    type: typeof attributes.type === "string" ? attributes.type : undefined,
    attributes
  };
}

/**
 * Parse one listing response envelope.
 *
 * @param value - Decoded JSON body.
 * @param url - Page URL, used in error messages.
 * @throws FetchError when the body has no `data` array.
 */
export function toProjectPage(value: JsonValue, url: string): ProjectPage {
  if (!isRecord(value) || !Array.isArray(value.data)) {
    throw new FetchError(`Malformed project page: ${url}`);
  }
  const items: Project[] = [];
  for (const raw of value.data) {
    if (!isRecord(raw)) {
      debug(`Dropping non-object entry in ${url}.`);
      continue;
    }
    items.push(toProject(raw));
  }
  const links = value.links;
  const next = isRecord(links) && typeof links.next === "string" && links.next !== "" ? links.next : undefined;
  return { items, next };
}

/**
 * Walk every page of the organisation's projects.
 *
 * @param client - Authenticated HTTP client.
 * @param settings - Endpoint and pacing settings.
 * @param orgId - Organisation identifier.
 * @param filter - Allow-listed project types; empty for all types.
 * @param pause - Pause between consecutive page requests.
 * @returns Projects of all pages in server order.
 * @throws FetchError on the first HTTP, network or envelope failure; earlier pages are discarded.
 */
export async function fetchAllProjects(
  client: AxiosInstance,
  settings: Settings,
  orgId: string,
  filter: readonly string[],
  pause: (delayMs: number) => Promise<void> = sleep
): Promise<Project[]> {
  const { api, pacing } = settings;
  const projects: Project[] = [];
  const seenIds = new Set<string>();
  let nextUrl: string | undefined = projectsUrl(api, orgId, filter);
  let pageNumber = 0;

  while (nextUrl !== undefined) {
    const url: string = nextUrl;
    pageNumber += 1;
    debug(`Fetching page ${pageNumber}: ${displayPath(url, api.host)}`);

    let body: JsonValue;
    try {
      const response = await serialised(() => client.get<JsonValue>(url));
      body = response.data;
    } catch (cause) {
      const failure = describeHttpError(cause);
      if (failure.body) {
        debug(`Response body: ${failure.body}`);
      }
      throw new FetchError(`Error fetching projects (page ${pageNumber}): ${failure.message}`, failure.status, failure.body);
    }

    const page = toProjectPage(body, displayPath(url, api.host));
    for (const project of page.items) {
      if (project.id !== undefined) {
        if (seenIds.has(project.id)) {
          warn(`Project ${project.id} listed more than once.`);
        }
        seenIds.add(project.id);
      }
      projects.push(project);
    }
    debug(`Page ${pageNumber} returned ${page.items.length} projects.`);

    nextUrl = page.next === undefined ? undefined : resolveNextUrl(page.next, url, api.host);
    if (nextUrl !== undefined) {
      await pause(pacing.requestDelayMs);
    }
  }

  info(`Fetched ${projects.length} projects across ${pageNumber} page(s).`);
  return projects;
}

/**
 * Set `test_frequency` on one project.
 *
 * @returns `success` on 2xx, `rate-limited` on 429, `failed` on any other HTTP or network error.
 */
export async function updateProjectFrequency(
  client: AxiosInstance,
  api: ApiSettings,
  orgId: string,
  projectId: string,
  frequency: Frequency
): Promise<UpdateOutcome> {
  const payload = {
    data: {
      type: "project",
      id: projectId,
      relationships: {},
      attributes: {
        test_frequency: frequency
      }
    }
  };

  try {
    const response = await serialised(() => client.patch(projectUrl(api, orgId, projectId), payload));
    return { kind: "success", status: response.status };
  } catch (cause) {
    const failure = describeHttpError(cause);
    if (failure.status === 429) {
      if (axios.isAxiosError(cause) && cause.response) {
        const retryAfter = normaliseHeaders(cause.response.headers)["retry-after"];
        if (retryAfter) {
          debug(`Server suggested Retry-After: ${retryAfter}`);
        }
      }
      return { kind: "rate-limited", status: 429 };
    }
    if (failure.body) {
      debug(`Response body: ${failure.body}`);
    }
    return {
      kind: "failed",
      error: new UpdateError(`Error updating project: ${failure.message}`, projectId, failure.status)
    };
  }
}
