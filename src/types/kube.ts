/**
 * Cluster-facing type definitions
 */

export type ClusterRole = "source" | "destination";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Extra environment variables for the child process */
  env?: Record<string, string>;
  /** Text written to the child's stdin */
  input?: string;
  /** Stream stdout to this file instead of buffering it */
  stdoutFile?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

/**
 * A manifest handed to `apply`
 */
export interface KubeManifest {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  spec?: Record<string, unknown>;
}

/**
 * A resource as returned by the API, before any decoding
 */
export type KubeObject = Record<string, unknown>;

export interface ClusterCredentials {
  /** API server URL, e.g. https://api.cluster:6443 */
  endpoint?: string;
  token?: string;
  username?: string;
  password?: string;
  insecureSkipTlsVerify: boolean;
}

export interface DeleteOptions {
  /** Block until the object is gone (default: false) */
  wait?: boolean;
}

/**
 * Operations the migration needs from one cluster.
 * Implemented over the `oc` CLI; replaced by an in-memory fake in tests.
 */
export interface ClusterClient {
  login(credentials: ClusterCredentials): Promise<void>;
  whoami(): Promise<string>;
  listApiResources(): Promise<void>;
  namespaceExists(namespace: string): Promise<boolean>;
  /** Returns null when the object does not exist */
  get(kind: string, name: string, namespace?: string): Promise<KubeObject | null>;
  list(kind: string, namespace?: string): Promise<KubeObject[]>;
  apply(manifest: KubeManifest): Promise<void>;
  /** Absence is not an error */
  delete(kind: string, name: string, namespace?: string, options?: DeleteOptions): Promise<void>;
  waitForCondition(
    kind: string,
    name: string,
    namespace: string,
    condition: string,
    timeoutSeconds: number,
  ): Promise<void>;
  /** Run a shell script in the pod's first container and return stdout */
  exec(namespace: string, pod: string, script: string): Promise<string>;
  /** Like exec, streaming stdout into a local file */
  execToFile(namespace: string, pod: string, script: string, localFile: string): Promise<void>;
  copyToPod(namespace: string, pod: string, localPath: string, remotePath: string): Promise<void>;
  syncFromPod(namespace: string, pod: string, remotePath: string, localDir: string): Promise<void>;
  syncToPod(namespace: string, pod: string, localPath: string, remoteDir: string): Promise<void>;
}
