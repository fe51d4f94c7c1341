// CHANGE: Compose listing and updating into one run.
// WHY: A failed listing must abort before the first update is attempted.

import type { AxiosInstance } from "axios";
import { fetchAllProjects, updateProjectFrequency } from "./api.js";
import type { Settings } from "./config.js";
import { dispatchUpdates } from "./dispatcher.js";
import { info } from "./logger.js";
import type { Project, RunConfig, RunSummary } from "./types.js";
import { createApiClient, sleep } from "./utils/http.js";

export type ListConfig = Pick<RunConfig, "orgId" | "token" | "filter">;

/**
 * Collaborators a run may receive instead of the real ones.
 */
export interface RunDependencies {
  readonly client?: AxiosInstance;
  readonly pause?: (delayMs: number) => Promise<void>;
}

/**
 * Fetch the matching projects without touching them.
 *
 * @throws FetchError when any page fails.
 */
export async function runList(config: ListConfig, settings: Settings, deps: RunDependencies = {}): Promise<Project[]> {
  const client = deps.client ?? createApiClient(settings.api, config.token);
  info(`Fetching projects for Organization ID: ${config.orgId}...`);
  return fetchAllProjects(client, settings, config.orgId, config.filter, deps.pause ?? sleep);
}

/**
 * Fetch every matching project, then set its test frequency.
 *
 * @throws FetchError when listing fails; no update is issued in that case.
 */
export async function runUpdate(config: RunConfig, settings: Settings, deps: RunDependencies = {}): Promise<RunSummary> {
  const client = deps.client ?? createApiClient(settings.api, config.token);
  const pause = deps.pause ?? sleep;
  const projects = await runList(config, settings, { client, pause });
  info(`Found ${projects.length} matching projects.`);

  if (projects.length === 0) {
    info("No projects to update.");
    return { fetched: 0, updated: 0, failed: 0, total: 0 };
  }

  info(`Starting project updates to frequency "${config.frequency}"...`);
  return dispatchUpdates(projects, {
    update: projectId => updateProjectFrequency(client, settings.api, config.orgId, projectId, config.frequency),
    pacing: settings.pacing,
    pause
  });
}
