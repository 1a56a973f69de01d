// CHANGE: Central export point for configuration types
// WHY: A single import point for types used across layers
// REF: REQ-20250210-MODULAR-ARCH
// SOURCE: n/a

export type { CLIOptions } from "./config.js";
export { DEFAULT_CLI_OPTIONS, LOG_LEVEL_LITERALS } from "./config.js";
