/**
 * Config Module - Preferences and Git global configuration
 */

export { ConfigManager } from "./manager.js";
export { GitGlobalConfig, parseConfigList } from "./git-config.js";
export type { GitConfigStore, ConfigEntry } from "./git-config.js";
export type {
  OnboardConfig,
  HostingConfig,
  GitDefaultsConfig,
  SSHKeyConfig,
  LoggingConfig,
} from "./types.js";
export { DEFAULT_CONFIG, SSHKeyType, httpsPrefix, sshPrefix } from "./types.js";
