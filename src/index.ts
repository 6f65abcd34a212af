export * from "./core/errors.js";
export * from "./core/paths.js";
export * from "./harness/feature-list.js";
export * from "./harness/init-script.js";
export * from "./harness/initializer.js";
export * from "./harness/progress-log.js";
export { createProgram, runCli, type CliIo, type CliOptions } from "./cli/program.js";
