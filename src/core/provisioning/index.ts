/**
 * Provisioning module exports
 */

export {
  ensureVolume,
  type EnsureVolumeResult,
  findIncompatibilities,
  normalizeAccessModes,
  provisionDestinationVolume,
  type ProvisionResult,
  resolveStorageClass,
  resolveVolumeSpec,
  type StorageClassChoice,
  type StorageClassOrigin,
} from "./resolver";
export {
  buildClaimManifest,
  type ClaimInfo,
  createClaim,
  decodeClaim,
  findDefaultStorageClass,
  inspectClaim,
  isDefaultStorageClass,
  storageClassExists,
} from "./volume";
