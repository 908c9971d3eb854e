import { readFile, writeFile } from "node:fs/promises";
import type {
  ClusterClient,
  ClusterCredentials,
  DeleteOptions,
  KubeManifest,
  KubeObject,
} from "../../src/types";

export interface FakeCall {
  method: string;
  args: unknown[];
}

export type ExecHandler = (namespace: string, pod: string, script: string) => string;

const KIND_ALIASES: Record<string, string> = {
  persistentvolumeclaim: "pvc",
  pvc: "pvc",
  pod: "pod",
  storageclass: "storageclass",
};

export function canonicalKind(kind: string): string {
  const lower = kind.toLowerCase();
  return KIND_ALIASES[lower] ?? lower;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function metadataOf(object: KubeObject): { name: string; namespace?: string } {
  const metadata = isRecord(object.metadata) ? object.metadata : {};
  const name = typeof metadata.name === "string" ? metadata.name : "";
  const namespace = typeof metadata.namespace === "string" ? metadata.namespace : undefined;
  return { name, namespace };
}

function manifestToObject(manifest: KubeManifest): KubeObject {
  return structuredClone({
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    metadata: { ...manifest.metadata },
    spec: manifest.spec,
  });
}

/**
 * In-memory stand-in for one cluster
 */
export class FakeCluster implements ClusterClient {
  readonly calls: FakeCall[] = [];
  readonly namespaces = new Set<string>();
  /** `<kind>/<namespace>/<name>` of every successful delete, in order */
  readonly deleted: string[] = [];
  /** Local files pushed with copyToPod, read at push time */
  readonly copied: { pod: string; remotePath: string; content: string }[] = [];
  user = "system:admin";
  archiveContent = "archive-bytes";
  execHandler: ExecHandler = () => "";
  onApply?: (manifest: KubeManifest) => void;

  private readonly objects = new Map<string, KubeObject>();
  private readonly applied = new Set<string>();
  private readonly statusScripts = new Map<string, Record<string, unknown>[]>();
  private readonly failures = new Map<string, Error>();

  private key(kind: string, name: string, namespace?: string): string {
    return `${canonicalKind(kind)}/${namespace ?? ""}/${name}`;
  }

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }

  private checkFailure(method: string, target?: string): void {
    const error =
      (target !== undefined ? this.failures.get(`${method}:${target}`) : undefined) ??
      this.failures.get(method);
    if (error) {
      throw error;
    }
  }

  /**
   * Make a method fail, for every target or only the named one
   */
  failOn(method: string, target?: string, error: Error = new Error(`${method} failed`)): this {
    this.failures.set(target === undefined ? method : `${method}:${target}`, error);
    return this;
  }

  /** Seed an object as if it already existed */
  put(object: KubeObject): this {
    const kind = typeof object.kind === "string" ? object.kind : "";
    const { name, namespace } = metadataOf(object);
    this.objects.set(this.key(kind, name, namespace), structuredClone(object));
    return this;
  }

  /** Seed an object from a manifest */
  putManifest(manifest: KubeManifest): this {
    const key = this.key(manifest.kind, manifest.metadata.name, manifest.metadata.namespace);
    this.objects.set(key, manifestToObject(manifest));
    return this;
  }

  /**
   * Status bodies returned by successive reads of an applied object. The last
   * one repeats.
   */
  scriptStatus(kind: string, name: string, namespace: string, statuses: Record<string, unknown>[]): this {
    this.statusScripts.set(this.key(kind, name, namespace), [...statuses]);
    return this;
  }

  find(kind: string, name: string, namespace?: string): KubeObject | undefined {
    return this.objects.get(this.key(kind, name, namespace));
  }

  callsTo(method: string): FakeCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async login(credentials: ClusterCredentials): Promise<void> {
    this.record("login", credentials);
    this.checkFailure("login");
  }

  async whoami(): Promise<string> {
    this.record("whoami");
    this.checkFailure("whoami");
    return this.user;
  }

  async listApiResources(): Promise<void> {
    this.record("listApiResources");
    this.checkFailure("listApiResources");
  }

  async namespaceExists(namespace: string): Promise<boolean> {
    this.record("namespaceExists", namespace);
    this.checkFailure("namespaceExists", namespace);
    return this.namespaces.has(namespace);
  }

  async get(kind: string, name: string, namespace?: string): Promise<KubeObject | null> {
    this.record("get", kind, name, namespace);
    this.checkFailure("get", name);

    const key = this.key(kind, name, namespace);
    const object = this.objects.get(key);
    if (!object) {
      return null;
    }

    const script = this.statusScripts.get(key);
    if (script && this.applied.has(key) && script.length > 0) {
      const status = script.length > 1 ? script.shift() : script[0];
      return { ...structuredClone(object), status };
    }
    return structuredClone(object);
  }

  async list(kind: string, namespace?: string): Promise<KubeObject[]> {
    this.record("list", kind, namespace);
    this.checkFailure("list", kind);
    const prefix = `${canonicalKind(kind)}/`;
    return [...this.objects.entries()]
      .filter(([key, object]) => {
        if (!key.startsWith(prefix)) return false;
        return namespace === undefined || metadataOf(object).namespace === namespace;
      })
      .map(([, object]) => structuredClone(object));
  }

  async apply(manifest: KubeManifest): Promise<void> {
    this.record("apply", manifest);
    this.checkFailure("apply", manifest.metadata.name);
    const key = this.key(manifest.kind, manifest.metadata.name, manifest.metadata.namespace);
    this.objects.set(key, manifestToObject(manifest));
    this.applied.add(key);
    this.onApply?.(manifest);
  }

  async delete(kind: string, name: string, namespace?: string, options: DeleteOptions = {}): Promise<void> {
    this.record("delete", kind, name, namespace, options);
    this.checkFailure("delete", name);
    const key = this.key(kind, name, namespace);
    this.objects.delete(key);
    this.applied.delete(key);
    this.deleted.push(`${canonicalKind(kind)}/${namespace ?? ""}/${name}`);
  }

  async waitForCondition(
    kind: string,
    name: string,
    namespace: string,
    condition: string,
    timeoutSeconds: number,
  ): Promise<void> {
    this.record("waitForCondition", kind, name, namespace, condition, timeoutSeconds);
    this.checkFailure("waitForCondition", name);
  }

  async exec(namespace: string, pod: string, script: string): Promise<string> {
    this.record("exec", namespace, pod, script);
    this.checkFailure("exec", pod);
    return this.execHandler(namespace, pod, script);
  }

  async execToFile(namespace: string, pod: string, script: string, localFile: string): Promise<void> {
    this.record("execToFile", namespace, pod, script, localFile);
    await writeFile(localFile, this.archiveContent);
    this.checkFailure("execToFile", pod);
  }

  async copyToPod(namespace: string, pod: string, localPath: string, remotePath: string): Promise<void> {
    this.record("copyToPod", namespace, pod, localPath, remotePath);
    this.checkFailure("copyToPod", pod);
    this.copied.push({ pod, remotePath, content: await readFile(localPath, "utf8") });
  }

  async syncFromPod(namespace: string, pod: string, remotePath: string, localDir: string): Promise<void> {
    this.record("syncFromPod", namespace, pod, remotePath, localDir);
    this.checkFailure("syncFromPod", pod);
  }

  async syncToPod(namespace: string, pod: string, localPath: string, remoteDir: string): Promise<void> {
    this.record("syncToPod", namespace, pod, localPath, remoteDir);
    this.checkFailure("syncToPod", pod);
  }
}

export function successfulCondition(reason = "Successful", status = "True"): Record<string, unknown> {
  return { conditions: [{ type: "Successful", status, reason }] };
}
