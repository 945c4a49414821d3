/**
 * Setup Module - Global Git configuration
 */

export { GitConfigurator, credentialHelperFor, rewriteKeyFor } from './configurator.js';
export type { GitIdentity, ConfiguratorOptions, ConfigurationSummary } from './configurator.js';
