// CHANGE: Sequential update loop with per-project state and rate-limit retry.
// WHY: Counters change only when a project reaches a terminal outcome; a 429 retries the same project.

import type { PacingSettings } from "./config.js";
import { UpdateError } from "./errors.js";
import { error as logError, info, warn } from "./logger.js";
import type { Project, RunSummary, TerminalOutcome, UpdateOutcome } from "./types.js";
import { describeHttpError, sleep } from "./utils/http.js";

/**
 * Lifecycle of one project inside a run. `done` is terminal.
 */
export type ItemState =
  | { readonly phase: "pending" }
  | { readonly phase: "in-flight"; readonly attempt: number }
  | { readonly phase: "rate-limited"; readonly attempt: number }
  | { readonly phase: "done"; readonly outcome: TerminalOutcome; readonly attempts: number };

export type ProjectUpdater = (projectId: string) => Promise<UpdateOutcome>;

export interface DispatchOptions {
  readonly update: ProjectUpdater;
  readonly pacing: PacingSettings;
  readonly pause?: (delayMs: number) => Promise<void>;
}

async function attempt(update: ProjectUpdater, projectId: string): Promise<UpdateOutcome> {
  try {
    return await update(projectId);
  } catch (cause) {
    return {
      kind: "failed",
      error: new UpdateError(`Error updating project: ${describeHttpError(cause).message}`, projectId)
    };
  }
}

/**
 * Drive one project from `pending` to `done`.
 *
 * Rate-limited attempts pause for `rateLimitDelayMs` and retry the same project,
 * without limit unless `maxRateLimitRetries` is set.
 */
export async function settleProject(
  project: Project,
  options: DispatchOptions
): Promise<Extract<ItemState, { readonly phase: "done" }>> {
  const pause = options.pause ?? sleep;
  const { rateLimitDelayMs, maxRateLimitRetries } = options.pacing;
  const projectId = project.id;
  if (projectId === undefined) {
    return {
      phase: "done",
      outcome: { kind: "failed", error: new UpdateError("Project has no identifier.", "") },
      attempts: 0
    };
  }

  let state: ItemState = { phase: "pending" };
  let rateLimitedCount = 0;
  for (;;) {
    switch (state.phase) {
      case "pending":
        state = { phase: "in-flight", attempt: 1 };
        break;
      case "in-flight": {
        const outcome = await attempt(options.update, projectId);
        if (outcome.kind !== "rate-limited") {
          return { phase: "done", outcome, attempts: state.attempt };
        }
        rateLimitedCount += 1;
        if (maxRateLimitRetries !== null && rateLimitedCount > maxRateLimitRetries) {
          const error = new UpdateError(`Rate limited ${rateLimitedCount} time(s); giving up.`, projectId, 429);
          return { phase: "done", outcome: { kind: "failed", error }, attempts: state.attempt };
        }
        state = { phase: "rate-limited", attempt: state.attempt };
        break;
      }
      case "rate-limited":
        warn(`RATE LIMIT HIT. Pausing for ${rateLimitDelayMs}ms before retrying project ${projectId}...`);
        await pause(rateLimitDelayMs);
        state = { phase: "in-flight", attempt: state.attempt + 1 };
        break;
    }
  }
}

/**
 * Apply the update to every project in fetch order.
 *
 * @param projects - Output of the listing phase.
 * @returns Counters; `updated + failed === total` on return.
 */
export async function dispatchUpdates(projects: readonly Project[], options: DispatchOptions): Promise<RunSummary> {
  const pause = options.pause ?? sleep;
  const total = projects.length;
  let updated = 0;
  let failed = 0;

  for (const [index, project] of projects.entries()) {
    const position = `[${index + 1}/${total}]`;
    if (project.id === undefined) {
      logError(`  ${position} Skipping item, no project ID found.`);
    } else {
      info(`  ${position} Updating project: ${project.name} (ID: ${project.id})`);
    }

    const done = await settleProject(project, options);
    if (done.outcome.kind === "success") {
      updated += 1;
      info("    > Success.");
    } else {
      failed += 1;
      if (done.attempts > 0) {
        logError(`    > Failed: ${done.outcome.error.message}`);
      }
    }

    if (done.attempts > 0 && index < total - 1) {
      await pause(options.pacing.requestDelayMs);
    }
  }

  return { fetched: total, updated, failed, total };
}
