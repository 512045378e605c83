/**
 * Configuration module exports
 */

// Defaults
export { CONFIG_FILE_NAMES, DEFAULT_DOCUMENT, DEFAULT_KEEP, deepMerge } from "./defaults";
// INI reader
export { type IniEntry, type IniSection, iniToDocument, parseIni } from "./ini";
// Loader
export { findAndLoadConfig, findConfigFile, loadConfig, parseConfigContent } from "./loader";
// Resolver
export { parseObjectEntry, parseTelegramCredentials, resolveConfig } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
