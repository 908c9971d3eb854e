/**
 * Incremental-sync transfer through a local staging directory
 */

import { mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { TransferResult } from "../../types";
import { logger } from "../../utils/logger";
import { errorMessage, TransferError } from "../errors";
import type { TransferContext, TransferStrategy } from "./types";

export const STAGING_DIR_NAME = "tmp_copy";

export class SyncTransfer implements TransferStrategy {
  readonly method = "rsync";

  async transfer(context: TransferContext): Promise<TransferResult> {
    const start = Date.now();
    const { source, destination } = context;
    const leaf = path.posix.basename(context.sourceDirectory);
    const staging = path.join(context.stagingDir, STAGING_DIR_NAME);

    await mkdir(staging, { recursive: true });
    try {
      logger.info(`Pulling '${context.sourceDirectory}' from pod '${source.pod}'...`);
      try {
        await source.client.syncFromPod(source.namespace, source.pod, context.sourceDirectory, staging);
      } catch (error) {
        throw new TransferError(`Pulling from the source pod failed: ${errorMessage(error)}`, { cause: error });
      }

      logger.info(`Pushing to '${context.destinationRoot}' on pod '${destination.pod}'...`);
      try {
        await destination.client.syncToPod(
          destination.namespace,
          destination.pod,
          path.join(staging, leaf),
          context.destinationRoot,
        );
      } catch (error) {
        throw new TransferError(`Pushing to the destination pod failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    } finally {
      await rm(staging, { recursive: true, force: true });
    }

    return {
      method: this.method,
      destinationDirectory: path.posix.join(context.destinationRoot, leaf),
      durationMs: Date.now() - start,
    };
  }
}
