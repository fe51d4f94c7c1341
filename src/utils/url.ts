// CHANGE: URL builders for the organisation projects endpoints and continuation links.
// WHY: Every request must carry the API version; continuation links arrive absolute or host-relative.

import type { ApiSettings } from "../config.js";
import { FetchError } from "../errors.js";

function orgBase(api: ApiSettings, orgId: string): string {
  return `${api.host}${api.basePath}/orgs/${encodeURIComponent(orgId)}/projects`;
}

/**
 * First page URL of the project listing.
 *
 * @param filter - Allow-listed project types; omitted from the query when empty.
 */
export function projectsUrl(api: ApiSettings, orgId: string, filter: readonly string[]): string {
  let query = `version=${encodeURIComponent(api.version)}&limit=${api.pageLimit}`;
  if (filter.length > 0) {
    query += `&types=${filter.map(tag => encodeURIComponent(tag)).join(",")}`;
  }
  return `${orgBase(api, orgId)}?${query}`;
}

export function projectUrl(api: ApiSettings, orgId: string, projectId: string): string {
  return `${orgBase(api, orgId)}/${encodeURIComponent(projectId)}?version=${encodeURIComponent(api.version)}`;
}

/**
 * Turn a `links.next` value into a requestable URL on the API host.
 *
 * @param link - Absolute, protocol-relative or relative URL returned by the server.
 * @param currentUrl - URL of the page that returned the link.
 * @param host - API host every continuation must stay on.
 * @throws FetchError when the link is malformed or points at another origin.
 */
export function resolveNextUrl(link: string, currentUrl: string, host: string): string {
  let resolved: URL;
  try {
    resolved = new URL(link, currentUrl);
  } catch {
    throw new FetchError(`Malformed continuation link: ${link}`);
  }
  if (resolved.origin !== new URL(host).origin) {
    throw new FetchError(`Continuation link leaves the API host: ${resolved.origin}`);
  }
  return resolved.href;
}

/**
 * Strip host and query string for log output.
 */
export function displayPath(url: string, host: string): string {
  const withoutHost = url.startsWith(host) ? url.slice(host.length) : url;
  return withoutHost.split("?")[0] ?? withoutHost;
}
