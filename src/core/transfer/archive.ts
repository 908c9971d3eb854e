/**
 * Stream-archive transfer: tar on the source pod, one local file, untar on
 * the destination pod.
 */

import { rm } from "node:fs/promises";
import * as path from "node:path";
import type { TransferResult } from "../../types";
import { logger } from "../../utils/logger";
import { shellQuote } from "../../utils/shell";
import { errorMessage, TransferError } from "../errors";
import type { TransferContext, TransferStrategy } from "./types";

export const LOCAL_ARCHIVE_NAME = "payload.tar";
export const REMOTE_ARCHIVE_PATH = "/tmp/payload.tar";

async function step<T>(description: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new TransferError(`${description} failed: ${errorMessage(error)}`, { cause: error });
  }
}

export class ArchiveTransfer implements TransferStrategy {
  readonly method = "tar";

  async transfer(context: TransferContext): Promise<TransferResult> {
    const start = Date.now();
    const { source, destination } = context;
    const parent = path.posix.dirname(context.sourceDirectory);
    const leaf = path.posix.basename(context.sourceDirectory);
    const localArchive = path.join(context.stagingDir, LOCAL_ARCHIVE_NAME);

    try {
      logger.info(`Packing '${context.sourceDirectory}' on pod '${source.pod}'...`);
      await step("Packing the source directory", () =>
        source.client.execToFile(
          source.namespace,
          source.pod,
          `cd ${shellQuote(parent)} && tar cf - ${shellQuote(leaf)}`,
          localArchive,
        ),
      );

      logger.info(`Pushing archive to pod '${destination.pod}'...`);
      await step("Pushing the archive", () =>
        destination.client.copyToPod(destination.namespace, destination.pod, localArchive, REMOTE_ARCHIVE_PATH),
      );
    } finally {
      await rm(localArchive, { force: true });
    }

    const root = shellQuote(context.destinationRoot);
    logger.info(`Unpacking archive under '${context.destinationRoot}'...`);
    await step("Unpacking the archive", () =>
      destination.client.exec(
        destination.namespace,
        destination.pod,
        `mkdir -p ${root} && tar xf ${REMOTE_ARCHIVE_PATH} -C ${root} && rm -f ${REMOTE_ARCHIVE_PATH}`,
      ),
    );

    return {
      method: this.method,
      destinationDirectory: path.posix.join(context.destinationRoot, leaf),
      durationMs: Date.now() - start,
    };
  }
}
