/**
 * Crypto Module - Public API
 */

export {
  inspectCredentials,
  loadHubCredentials,
  type CredentialSummary,
  type HubCredentials,
} from './Certificates.mjs';
