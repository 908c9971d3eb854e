/**
 * Workload lifecycle exports
 */

export {
  awaitWorkloadReady,
  buildWorkloadManifest,
  claimPathInPod,
  defineWorkload,
  launchWorkload,
  terminateWorkload,
  WORKLOAD_CONTAINER,
  WORKLOAD_LABEL,
} from "./lifecycle";
