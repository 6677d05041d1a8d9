/**
 * Configuration Module
 *
 * Exports provider defaults and the environment reader.
 */

export {
  getProviderConfig,
  PROVIDER_DEFAULTS,
  MAX_PROVIDER_RESULTS,
} from './providers';

export type { ProviderConfig, ProviderBaseUrls } from './providers';
