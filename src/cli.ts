// CHANGE: CLI wiring for update, list and types commands.
// WHY: Inputs are collected and validated here; the run itself only sees a finished RunConfig.

import { Command } from "commander";
import { loadSettings, type Settings } from "./config.js";
import { ConfigurationError, exitCodeFor } from "./errors.js";
import { debug, error as logError, info, isLogLevel, setLogLevel, warn } from "./logger.js";
import {
  CONTAINER_TYPES,
  IAC_TYPES,
  OPEN_SOURCE_TYPES,
  PROJECT_TYPES,
  dailyRestrictedTypes,
  resolveTypeFilter,
  type PresetName
} from "./project-types.js";
import { createTerminalPrompter, type Prompter } from "./prompt.js";
import { runList, runUpdate, type ListConfig, type RunDependencies } from "./runner.js";
import { FREQUENCIES, isFrequency, type Frequency, type Project, type RunConfig, type RunSummary } from "./types.js";

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Options shared by the commands that talk to the API, as parsed by commander.
 */
export interface ConnectionOptions {
  readonly org?: string;
  readonly token?: string;
  readonly types?: string;
  readonly allTypes?: boolean;
  readonly sca?: boolean;
  readonly iac?: boolean;
  readonly container?: boolean;
  readonly input?: boolean;
}

export interface UpdateOptions extends ConnectionOptions {
  readonly frequency?: string;
}

/**
 * Overrides for tests; every field falls back to the real process environment.
 */
export interface ActionDependencies extends RunDependencies {
  readonly env?: Env;
  readonly settings?: Settings;
  readonly prompter?: Prompter | null;
}

export function selectedPresets(options: ConnectionOptions): PresetName[] {
  const presets: PresetName[] = [];
  if (options.allTypes) {
    presets.push("all");
  }
  if (options.sca) {
    presets.push("sca");
  }
  if (options.iac) {
    presets.push("iac");
  }
  if (options.container) {
    presets.push("container");
  }
  return presets;
}

async function valueFrom(
  flag: string | undefined,
  envValue: string | undefined,
  prompter: Prompter | null,
  question: string
): Promise<string> {
  const direct = flag?.trim() || envValue?.trim();
  if (direct) {
    return direct;
  }
  return prompter ? prompter.ask(question) : "";
}

async function resolveFilter(options: ConnectionOptions, prompter: Prompter | null): Promise<readonly string[]> {
  const presets = selectedPresets(options);
  let types = options.types;
  if (presets.length === 0 && types === undefined && prompter) {
    info(`Allowed types: ${[...PROJECT_TYPES].sort().join(", ")}`);
    types = await prompter.ask("Enter desired types (comma-separated), or press Enter to skip: ");
  }
  const filter = resolveTypeFilter({ presets, types });
  const [preset] = presets;
  if (preset) {
    info(`Using the "${preset}" preset (${filter.length} project types).`);
  } else if (filter.length > 0) {
    info(`Filtering by types: ${filter.join(", ")}`);
  } else {
    info("No filter specified. Fetching all project types.");
  }
  return filter;
}

/**
 * Collect organisation, token and type filter from flags, environment, then prompts.
 *
 * @throws ConfigurationError when the token or organisation ID is missing.
 */
export async function resolveListConfig(
  options: ConnectionOptions,
  env: Env,
  prompter: Prompter | null
): Promise<ListConfig> {
  const token = await valueFrom(options.token, env.SNYK_TOKEN, prompter, "Enter your API token (or set SNYK_TOKEN): ");
  const orgId = await valueFrom(options.org, env.SNYK_ORG_ID, prompter, "Enter your Organization ID: ");
  if (!token || !orgId) {
    throw new ConfigurationError("API token and Organization ID are required.");
  }
  const filter = await resolveFilter(options, prompter);
  return { token, orgId, filter };
}

/**
 * Build the validated configuration of an update run.
 *
 * @throws ConfigurationError when token, organisation ID or frequency is missing, or the frequency is unknown.
 */
export async function resolveRunConfig(options: UpdateOptions, env: Env, prompter: Prompter | null): Promise<RunConfig> {
  const token = await valueFrom(options.token, env.SNYK_TOKEN, prompter, "Enter your API token (or set SNYK_TOKEN): ");
  const orgId = await valueFrom(options.org, env.SNYK_ORG_ID, prompter, "Enter your Organization ID: ");
  if (prompter && !options.frequency?.trim() && !env.SNYK_TEST_FREQUENCY?.trim()) {
    info(`Allowed frequency: ${FREQUENCIES.join(", ")}`);
    info("Note: SAST and IaC projects can only be set to weekly or never.");
  }
  const rawFrequency = await valueFrom(
    options.frequency,
    env.SNYK_TEST_FREQUENCY,
    prompter,
    "Enter your desired test frequency: "
  );
  if (!token || !orgId || !rawFrequency) {
    throw new ConfigurationError("API token, frequency and Organization ID are required.");
  }
  const frequency = parseFrequency(rawFrequency);
  const filter = await resolveFilter(options, prompter);
  return { token, orgId, frequency, filter };
}

export function parseFrequency(raw: string): Frequency {
  const normalised = raw.trim().toLowerCase();
  if (!isFrequency(normalised)) {
    throw new ConfigurationError(`Unsupported frequency "${raw}". Allowed: ${FREQUENCIES.join(", ")}.`);
  }
  return normalised;
}

function openPrompter(options: ConnectionOptions, deps: ActionDependencies): Prompter | null {
  if (deps.prompter !== undefined) {
    return deps.prompter;
  }
  return options.input !== false && process.stdin.isTTY ? createTerminalPrompter() : null;
}

export function printSummary(summary: RunSummary): void {
  info("--- Update Complete ---");
  info(`Successfully updated: ${summary.updated}`);
  info(`Failed to update:     ${summary.failed}`);
  info(`Total projects:       ${summary.total}`);
}

/**
 * Update mode entry point: resolve inputs, list projects, set their frequency.
 */
export async function updateAction(options: UpdateOptions, deps: ActionDependencies = {}): Promise<RunSummary> {
  const settings = deps.settings ?? loadSettings(deps.env ?? process.env);
  const prompter = openPrompter(options, deps);
  let config: RunConfig;
  try {
    config = await resolveRunConfig(options, deps.env ?? process.env, prompter);
  } finally {
    prompter?.close();
  }
  const restricted = dailyRestrictedTypes(config.filter);
  if (config.frequency === "daily" && restricted.length > 0) {
    warn(`Projects of type ${restricted.join(", ")} accept only weekly or never; their updates are expected to fail.`);
  }
  debug(`Pacing: ${settings.pacing.requestDelayMs}ms between requests, ${settings.pacing.rateLimitDelayMs}ms after a rate limit.`);
  const summary = await runUpdate(config, settings, deps);
  if (summary.total > 0) {
    printSummary(summary);
  }
  return summary;
}

/**
 * List mode entry point: show matching projects without updating them.
 */
export async function listAction(options: ConnectionOptions, deps: ActionDependencies = {}): Promise<Project[]> {
  const settings = deps.settings ?? loadSettings(deps.env ?? process.env);
  const prompter = openPrompter(options, deps);
  let config: ListConfig;
  try {
    config = await resolveListConfig(options, deps.env ?? process.env, prompter);
  } finally {
    prompter?.close();
  }
  const projects = await runList(config, settings, deps);
  console.table(
    projects.map((project, idx) => ({
      index: idx + 1,
      id: project.id ?? "",
      name: project.name,
      type: project.type ?? ""
    }))
  );
  info(`Matching projects: ${projects.length}`);
  return projects;
}

/**
 * Types mode entry point: print the allow-list grouped by preset.
 */
export function typesAction(): void {
  console.log(`sca (--sca):             ${OPEN_SOURCE_TYPES.join(", ")}`);
  console.log(`iac (--iac):             ${IAC_TYPES.join(", ")}`);
  console.log(`container (--container): ${CONTAINER_TYPES.join(", ")}`);
  console.log("other:                   sast");
}

function addConnectionOptions(command: Command): Command {
  return command
    .option("-o, --org <id>", "organization ID (env SNYK_ORG_ID)")
    .option("-t, --token <token>", "API token (env SNYK_TOKEN)")
    .option("--types <list>", "comma-separated project types to include")
    .option("--all-types", "filter by every allowed project type")
    .option("--sca", "filter by open source project types")
    .option("--iac", "filter by infrastructure-as-code project types")
    .option("--container", "filter by container project types")
    .option("--no-input", "never prompt; fail when a required value is missing");
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("frequency-updater")
    .description("Set the test frequency of every project in an organization")
    .version("1.0.0")
    .option("--log-level <level>", "debug, info, warn or error");

  program.hook("preAction", thisCommand => {
    const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
    if (logLevel) {
      if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`Unsupported log level: ${logLevel}`);
      }
      setLogLevel(logLevel);
    }
  });

  addConnectionOptions(
    program.command("update", { isDefault: true }).description("List projects and set their test frequency")
  )
    .option("-f, --frequency <frequency>", `one of ${FREQUENCIES.join(", ")} (env SNYK_TEST_FREQUENCY)`)
    .action(async (options: UpdateOptions) => {
      await updateAction(options);
    });

  addConnectionOptions(program.command("list").description("List matching projects without updating them")).action(
    async (options: ConnectionOptions) => {
      await listAction(options);
    }
  );

  program
    .command("types")
    .description("Show allowed project types and presets")
    .action(() => typesAction());

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    const message = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
    logError(message);
    process.exitCode = exitCodeFor(cause);
  }
}
