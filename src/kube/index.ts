/**
 * Cluster access exports
 */

export { commandExists, isOcAvailable, isRsyncAvailable, runCommand } from "./client";
export { KubeCommandError, type OcClientOptions, OcClusterClient, redact, renderManifest } from "./oc-client";
export { type ClusterSession, hasLoginCredentials, openSession } from "./session";
