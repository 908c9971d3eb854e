/**
 * Transfer strategy contracts
 */

import type { ClusterClient, TransferMethod, TransferResult } from "../../types";

export interface TransferEndpoint {
  client: ClusterClient;
  namespace: string;
  pod: string;
}

export interface TransferContext {
  source: TransferEndpoint;
  destination: TransferEndpoint;
  /** Absolute directory copied from the source pod; its leaf name is kept */
  sourceDirectory: string;
  /** Directory on the destination pod that receives the copy */
  destinationRoot: string;
  /** Local directory for staging files, scoped to the run */
  stagingDir: string;
}

export interface TransferStrategy {
  readonly method: TransferMethod;
  transfer(context: TransferContext): Promise<TransferResult>;
}
