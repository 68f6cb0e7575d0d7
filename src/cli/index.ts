export { buildProgram } from "./program";
export type { CliOptions } from "./program";
export { runCli } from "./runCli";
export type { CliContext } from "./runCli";
