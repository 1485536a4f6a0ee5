export { buildProgram, runCli, createCliLogger, CLI_NAME } from "./program.js";
export type { CliIO, CliContext, CliDependencies } from "./program.js";
export { theme } from "./theme.js";
