/**
 * Registry Module - Public API
 */

export {
  DeviceRegistry,
  type DeviceSource,
  type LookupResult,
  type RegistrySnapshot,
} from './DeviceRegistry.mjs';
