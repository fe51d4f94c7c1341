#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: CLI helpers stay importable without triggering command parsing.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { fetchAllProjects, updateProjectFrequency } from "./api.js";
export { dispatchUpdates } from "./dispatcher.js";
export { runList, runUpdate } from "./runner.js";
export { loadSettings } from "./config.js";
