/**
 * Core module exports for @faultline/core
 *
 * This package provides:
 * - Error type definitions, template parsing and descriptor validation
 * - The runtime front-end (defineError) and its ChainedError values
 * - Chain helpers (errorChain, rootCause, bail, ensure)
 * - Diagnostics, configuration and logging shared with @faultline/codegen
 */

export * from "./types.js";

// Display templates
export {
  DEFAULT_SOURCE_TEMPLATE,
  parseTemplate,
  tryParseTemplate,
  fieldRefs,
  type TemplateParseResult,
} from "./template.js";

// Descriptor builder
export { buildDescriptor, getVariant, conversionTable, RESERVED_VARIANT_NAMES } from "./descriptor.js";

// Behavior synthesis
export { synthesize, displayValue, type SynthesizedBehavior } from "./synthesize.js";

// Runtime values
export { ChainedError, type ChainedErrorInit } from "./chained-error.js";
export {
  defineError,
  errorFrom,
  errorKind,
  field,
  sourceOf,
  sourceType,
  type FieldSpec,
  type SourceWrapSpec,
  type CustomKindSpec,
  type VariantSpec,
  type VariantSpecs,
  type SourceLike,
  type VariantFields,
  type ErrorValue,
  type SourceOf,
  type VariantConstructors,
  type ErrorFactoryMembers,
  type ErrorFactory,
  type ErrorOf,
  type DefineErrorOptions,
} from "./define.js";
export { errorChain, rootCause, bail, ensure } from "./chain.js";

// Configuration System
export { config, defineConfig, type FaultlineConfig, type CodegenConfig } from "./config.js";
export { logger } from "./logger.js";

// Diagnostics System
export * from "./diagnostics.js";
