/**
 * SSH Module - Key generation and agent registration
 */

export { SSHKeyManager, parseAgentOutput, expandHome } from "./manager.js";
export type { SSHKeyManagerOptions, SSHKeySetupResult, SSHAgentEnvironment } from "./types.js";
