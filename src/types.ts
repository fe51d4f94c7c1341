// CHANGE: Define typed domain models for the list-then-update pipeline.
// WHY: Projects, outcomes and summaries cross module boundaries and must share one shape.

import type { UpdateError } from "./errors.js";

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Allowed values of the `test_frequency` project attribute.
 */
export const FREQUENCIES = ["daily", "weekly", "never"] as const;

export type Frequency = (typeof FREQUENCIES)[number];

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some(frequency => frequency === value);
}

/**
 * Project entry as listed by the organisation projects endpoint.
 *
 * Invariant: `id` is absent when the server entry carried no usable identifier;
 * such projects are never sent to the update endpoint.
 */
export interface Project {
  readonly id?: string;
  readonly name: string;
  readonly type?: string;
  readonly attributes: JsonObject;
}

/**
 * One page of the cursor-paginated listing.
 *
 * @property next - Continuation link, absent on the final page.
 */
export interface ProjectPage {
  readonly items: readonly Project[];
  readonly next?: string;
}

/**
 * Classification of a single update attempt.
 */
export type UpdateOutcome =
  | { readonly kind: "success"; readonly status: number }
  | { readonly kind: "failed"; readonly error: UpdateError }
  | { readonly kind: "rate-limited"; readonly status: 429 };

/**
 * Terminal classification of a project once the dispatcher is done with it.
 */
export type TerminalOutcome = Exclude<UpdateOutcome, { readonly kind: "rate-limited" }>;

/**
 * Counters produced by a dispatcher run.
 *
 * Invariant: `updated + failed === total` once the run completes.
 */
export interface RunSummary {
  readonly fetched: number;
  readonly updated: number;
  readonly failed: number;
  readonly total: number;
}

/**
 * Fully validated input for one run. Built by the CLI layer; the core never prompts.
 */
export interface RunConfig {
  readonly orgId: string;
  readonly token: string;
  readonly frequency: Frequency;
  readonly filter: readonly string[];
}
