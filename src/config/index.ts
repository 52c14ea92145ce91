/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_PAUSE, TASK_KIND_DIRS } from "./defaults";
// Loader
export { loadScheme, parseSchemeContent } from "./loader";
// Resolver
export { type RunConfigInput, RunConfigError, resolveRunConfig } from "./resolver";
// Validator
export { SCHEME_TASK_TYPES, validateScheme } from "./validator";
