/**
 * Transfer module exports
 */

import type { TransferMethod } from "../../types";
import { logger } from "../../utils/logger";
import { ArchiveTransfer } from "./archive";
import { SyncTransfer } from "./sync";
import type { TransferStrategy } from "./types";

export { ArchiveTransfer, LOCAL_ARCHIVE_NAME, REMOTE_ARCHIVE_PATH } from "./archive";
export {
  type DirectorySize,
  measureDirectory,
  parseDuOutput,
  prepareDestination,
  relabelDirectory,
} from "./remote";
export { STAGING_DIR_NAME, SyncTransfer } from "./sync";
export type { TransferContext, TransferEndpoint, TransferStrategy } from "./types";
export { compareSizes, reportSizeCheck, sizeTolerance, verifyTransferSize } from "./verify";

export interface StrategyCapabilities {
  rsyncAvailable: boolean;
}

/**
 * Strategy for the configured method. rsync falls back to tar when the local
 * rsync binary is missing.
 */
export function selectTransferStrategy(
  method: TransferMethod,
  capabilities: StrategyCapabilities,
): TransferStrategy {
  if (method === "rsync") {
    if (capabilities.rsyncAvailable) {
      return new SyncTransfer();
    }
    logger.info("rsync not available; switching to tar");
  }
  return new ArchiveTransfer();
}
