/**
 * Installation Module - Git installation per operating system
 */

export {
  InstallationManager,
  LINUX_INSTALL_COMMANDS,
  HOMEBREW_INSTALL_SCRIPT,
  HOMEBREW_LOCATIONS,
  MANUAL_DOWNLOADS,
} from "./manager.js";
export type {
  InstallationOptions,
  InstallationResult,
  InstallationProgress,
  PackageCommand,
  ProgressCallback,
} from "./types.js";
export { InstallationStep, StepStatus } from "./types.js";
