/**
 * @faultline/codegen
 *
 * Reads error types declared as annotated interfaces and writes standalone
 * modules for them. See `faultline --help` for the command line.
 */

export {
  readDefinitions,
  readDefinitionsFromText,
  parseSource,
  parseTagArguments,
  locationOf,
  type TagArguments,
  type TagArgumentsResult,
} from "./annotations.js";
export { emitErrorModule, liftName, type EmitOptions } from "./emit.js";
export {
  generateFromSource,
  generateFile,
  checkFile,
  outputPathFor,
  rebaseSpecifier,
  type GenerateOptions,
  type GenerateResult,
  type CheckResult,
} from "./generate.js";
export { runCli, EXIT_OK, EXIT_FAILURE, EXIT_USAGE, type CliIO } from "./cli.js";
