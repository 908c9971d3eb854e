/**
 * Destination volume provisioning: derive a spec from the source claim and
 * make sure a matching claim exists on the destination cluster.
 */

import { DEFAULTS } from "../../config/defaults";
import type { ClusterClient, VolumeSpec } from "../../types";
import { logger } from "../../utils/logger";
import { compareQuantities } from "../../utils/quantity";
import { errorMessage, ProvisioningError } from "../errors";
import {
  type ClaimInfo,
  createClaim,
  findDefaultStorageClass,
  inspectClaim,
  storageClassExists,
} from "./volume";

export type StorageClassOrigin = "source" | "destination-default" | "cluster-default";

export interface StorageClassChoice {
  /** Undefined means the claim omits storageClassName */
  name?: string;
  origin: StorageClassOrigin;
}

export interface EnsureVolumeResult {
  created: boolean;
  claim: ClaimInfo | null;
}

/**
 * Pick the destination storage class. First match wins:
 * the source's class if the destination has it, then the destination's
 * default class, then none at all.
 */
export async function resolveStorageClass(
  destination: ClusterClient,
  sourceClass: string | undefined,
): Promise<StorageClassChoice> {
  if (sourceClass) {
    try {
      if (await storageClassExists(destination, sourceClass)) {
        logger.info(`Using source storage class '${sourceClass}' on destination`);
        return { name: sourceClass, origin: "source" };
      }
      logger.info(`Storage class '${sourceClass}' does not exist on destination`);
    } catch (error) {
      logger.warn(`Could not look up storage class '${sourceClass}': ${errorMessage(error)}`);
    }
  }

  try {
    const defaultClass = await findDefaultStorageClass(destination);
    if (defaultClass) {
      logger.info(`Using destination default storage class '${defaultClass}'`);
      return { name: defaultClass, origin: "destination-default" };
    }
  } catch (error) {
    logger.warn(`Could not list destination storage classes: ${errorMessage(error)}`);
  }

  logger.warn(
    "Could not detect a default storage class on destination; the claim will use the cluster default",
  );
  return { origin: "cluster-default" };
}

/**
 * Access modes as a set: de-duplicated, sorted, never empty
 */
export function normalizeAccessModes(modes: string[]): string[] {
  const unique = [...new Set(modes)].sort();
  return unique.length > 0 ? unique : [DEFAULTS.fallbackAccessMode];
}

/**
 * Derive the destination spec from the source claim
 */
export async function resolveVolumeSpec(
  source: ClaimInfo,
  destination: ClusterClient,
): Promise<VolumeSpec> {
  let capacity = source.capacity;
  if (!capacity) {
    logger.warn(
      `Could not read size of source claim '${source.name}'; defaulting to ${DEFAULTS.fallbackCapacity}`,
    );
    capacity = DEFAULTS.fallbackCapacity;
  }

  const storageClass = await resolveStorageClass(destination, source.storageClassName);

  return {
    capacity,
    accessModes: normalizeAccessModes(source.accessModes),
    volumeMode: source.volumeMode ?? DEFAULTS.fallbackVolumeMode,
    ...(storageClass.name && { storageClassName: storageClass.name }),
  };
}

/**
 * Reasons an existing claim cannot take the resolved spec; empty when it can.
 * A larger existing claim is fine; a capacity that cannot be parsed is logged
 * and accepted.
 */
export function findIncompatibilities(existing: ClaimInfo, wanted: VolumeSpec): string[] {
  const problems: string[] = [];

  const existingModes = normalizeAccessModes(existing.accessModes);
  if (existingModes.join(",") !== wanted.accessModes.join(",")) {
    problems.push(`access modes [${existingModes.join(", ")}] != [${wanted.accessModes.join(", ")}]`);
  }

  const existingVolumeMode = existing.volumeMode ?? DEFAULTS.fallbackVolumeMode;
  if (existingVolumeMode !== wanted.volumeMode) {
    problems.push(`volume mode ${existingVolumeMode} != ${wanted.volumeMode}`);
  }

  if (existing.capacity) {
    const comparison = compareQuantities(existing.capacity, wanted.capacity);
    if (comparison === null) {
      logger.warn(
        `Cannot compare capacity '${existing.capacity}' of claim '${existing.name}' with '${wanted.capacity}'`,
      );
    } else if (comparison < 0) {
      problems.push(`capacity ${existing.capacity} < ${wanted.capacity}`);
    }
  }

  return problems;
}

/**
 * Create the claim unless one of that name already exists. An existing claim
 * is kept, but must be compatible with the spec.
 */
export async function ensureVolume(
  client: ClusterClient,
  namespace: string,
  name: string,
  spec: VolumeSpec,
): Promise<EnsureVolumeResult> {
  let existing: ClaimInfo | null;
  try {
    existing = await inspectClaim(client, namespace, name);
  } catch (error) {
    throw new ProvisioningError(`Failed to look up claim '${name}' in '${namespace}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (existing) {
    const problems = findIncompatibilities(existing, spec);
    if (problems.length > 0) {
      throw new ProvisioningError(
        `Destination claim '${name}' in '${namespace}' already exists but does not match the source: ${problems.join("; ")}`,
      );
    }
    logger.info(`Destination claim '${name}' already exists in '${namespace}'. Skipping creation.`);
    return { created: false, claim: existing };
  }

  logger.info(
    `Creating destination claim '${name}' in '${namespace}' (size=${spec.capacity}, ` +
      `modes=[${spec.accessModes.join(", ")}], volumeMode=${spec.volumeMode}, ` +
      `sc=${spec.storageClassName ?? "<cluster-default>"})...`,
  );

  try {
    await createClaim(client, namespace, name, spec);
  } catch (error) {
    throw new ProvisioningError(`Failed to create claim '${name}' in '${namespace}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.info(`Destination claim '${name}' created`);
  return { created: true, claim: null };
}

export interface ProvisionResult {
  source: ClaimInfo;
  spec: VolumeSpec;
  created: boolean;
}

/**
 * Read the source claim, resolve the destination spec and ensure the claim
 */
export async function provisionDestinationVolume(
  source: { client: ClusterClient; namespace: string; claimName: string },
  destination: { client: ClusterClient; namespace: string; claimName: string },
): Promise<ProvisionResult> {
  let sourceClaim: ClaimInfo | null;
  try {
    sourceClaim = await inspectClaim(source.client, source.namespace, source.claimName);
  } catch (error) {
    throw new ProvisioningError(
      `Failed to read source claim '${source.claimName}' in '${source.namespace}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!sourceClaim) {
    throw new ProvisioningError(`Source claim '${source.claimName}' not found in '${source.namespace}'`);
  }

  const spec = await resolveVolumeSpec(sourceClaim, destination.client);
  const { created } = await ensureVolume(
    destination.client,
    destination.namespace,
    destination.claimName,
    spec,
  );

  return { source: sourceClaim, spec, created };
}
