/**
 * Post-transfer size comparison. Advisory: a mismatch is a warning, never an
 * error, because block counts differ between filesystems.
 */

import type { SizeCheckResult } from "../../types";
import { logger } from "../../utils/logger";
import { measureDirectory } from "./remote";
import type { TransferEndpoint } from "./types";

export function sizeTolerance(sourceBlocks: number): number {
  return Math.floor(sourceBlocks / 100) + 16;
}

export function compareSizes(
  sourceBlocks: number | null,
  destinationBlocks: number | null,
): SizeCheckResult {
  if (sourceBlocks === null || destinationBlocks === null || sourceBlocks <= 0) {
    return { status: "skipped", sourceBlocks, destinationBlocks };
  }

  const tolerance = sizeTolerance(sourceBlocks);
  const delta = Math.abs(destinationBlocks - sourceBlocks);

  return {
    status: delta <= tolerance ? "passed" : "warning",
    sourceBlocks,
    destinationBlocks,
    tolerance,
    delta,
  };
}

export function reportSizeCheck(result: SizeCheckResult): void {
  switch (result.status) {
    case "passed":
      logger.info(`Size check PASSED (delta=${result.delta} <= ${result.tolerance})`);
      break;
    case "warning":
      logger.warn(`Size delta=${result.delta} exceeds tolerance ${result.tolerance}`);
      break;
    case "skipped":
      logger.info("Skipping size delta check; empty/unmeasurable");
      break;
  }
}

/**
 * Measure both sides and log the comparison
 */
export async function verifyTransferSize(
  source: TransferEndpoint,
  sourceDirectory: string,
  destination: TransferEndpoint,
  destinationDirectory: string,
): Promise<SizeCheckResult> {
  const sourceSize = await measureDirectory(source, sourceDirectory);
  logger.info(`Source backup dir size: ${sourceSize.human} (${sourceSize.blocks ?? 0} blocks)`);

  const destinationSize = await measureDirectory(destination, destinationDirectory);
  logger.info(
    `Destination backup dir size: ${destinationSize.human} (${destinationSize.blocks ?? 0} blocks)`,
  );

  const result = compareSizes(sourceSize.blocks, destinationSize.blocks);
  reportSizeCheck(result);
  return result;
}
