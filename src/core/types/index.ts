export type { CLIOptions, RunnerCommand, RunnerSettings } from "./config.js";
