/**
 * ClusterClient over the OpenShift CLI.
 *
 * Every call sets KUBECONFIG to the client's own file, so two clients in one
 * process never see each other's login.
 */

import * as yaml from "js-yaml";
import type {
  ClusterClient,
  ClusterCredentials,
  CommandResult,
  CommandRunner,
  DeleteOptions,
  KubeManifest,
  KubeObject,
  RunOptions,
} from "../types";
import { logger } from "../utils/logger";
import { shellJoin } from "../utils/shell";
import { runCommand } from "./client";

export class KubeCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly result: CommandResult,
  ) {
    super(`oc ${args.join(" ")} failed (exit ${result.exitCode}): ${result.stderr || result.stdout}`);
    this.name = "KubeCommandError";
  }
}

export interface OcClientOptions {
  /** kubeconfig file owned by this client */
  kubeconfig: string;
  runner?: CommandRunner;
  /** CLI binary (default: oc) */
  binary?: string;
}

const NOT_FOUND = /NotFound|not found/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Render a manifest as YAML for `oc apply -f -`
 */
export function renderManifest(manifest: KubeManifest): string {
  return yaml.dump(manifest, { noRefs: true, lineWidth: -1 });
}

export class OcClusterClient implements ClusterClient {
  readonly kubeconfig: string;
  private readonly runner: CommandRunner;
  private readonly binary: string;

  constructor(options: OcClientOptions) {
    this.kubeconfig = options.kubeconfig;
    this.runner = options.runner ?? runCommand;
    this.binary = options.binary ?? "oc";
  }

  /**
   * Run an oc command against this client's kubeconfig
   */
  run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    logger.debug(`Running: ${this.binary} ${shellJoin(redact(args))}`);
    return this.runner(this.binary, args, {
      ...options,
      env: { ...options.env, KUBECONFIG: this.kubeconfig },
    });
  }

  private async runOrThrow(args: string[], options?: RunOptions): Promise<CommandResult> {
    const result = await this.run(args, options);
    if (!result.success) {
      throw new KubeCommandError(redact(args), result);
    }
    return result;
  }

  async login(credentials: ClusterCredentials): Promise<void> {
    if (!credentials.endpoint) {
      throw new Error("API endpoint is required to log in");
    }

    const args = ["login", credentials.endpoint];
    if (credentials.token) {
      args.push("--token", credentials.token);
    } else if (credentials.username && credentials.password) {
      args.push("-u", credentials.username, "-p", credentials.password);
    } else {
      throw new Error("A token or a username and password are required to log in");
    }
    args.push(`--insecure-skip-tls-verify=${credentials.insecureSkipTlsVerify}`);

    await this.runOrThrow(args);
  }

  async whoami(): Promise<string> {
    const result = await this.runOrThrow(["whoami"]);
    return result.stdout;
  }

  async listApiResources(): Promise<void> {
    await this.runOrThrow(["api-resources"]);
  }

  async namespaceExists(namespace: string): Promise<boolean> {
    const result = await this.run(["get", "namespace", namespace, "-o", "name"]);
    return result.success;
  }

  async get(kind: string, name: string, namespace?: string): Promise<KubeObject | null> {
    const args = [...namespaceArgs(namespace), "get", kind, name, "-o", "json"];
    const result = await this.run(args);

    if (!result.success) {
      if (NOT_FOUND.test(result.stderr)) {
        return null;
      }
      throw new KubeCommandError(args, result);
    }

    const parsed: unknown = JSON.parse(result.stdout);
    if (!isRecord(parsed)) {
      throw new Error(`Unexpected output from oc get ${kind} ${name}`);
    }
    return parsed;
  }

  async list(kind: string, namespace?: string): Promise<KubeObject[]> {
    const args = [...namespaceArgs(namespace), "get", kind, "-o", "json"];
    const result = await this.runOrThrow(args);

    const parsed: unknown = JSON.parse(result.stdout);
    if (!isRecord(parsed) || !Array.isArray(parsed.items)) {
      return [];
    }
    return parsed.items.filter(isRecord);
  }

  async apply(manifest: KubeManifest): Promise<void> {
    const args = [...namespaceArgs(manifest.metadata.namespace), "apply", "-f", "-"];
    await this.runOrThrow(args, { input: renderManifest(manifest) });
  }

  async delete(
    kind: string,
    name: string,
    namespace?: string,
    options: DeleteOptions = {},
  ): Promise<void> {
    await this.runOrThrow([
      ...namespaceArgs(namespace),
      "delete",
      kind,
      name,
      "--ignore-not-found",
      `--wait=${options.wait ?? false}`,
    ]);
  }

  async waitForCondition(
    kind: string,
    name: string,
    namespace: string,
    condition: string,
    timeoutSeconds: number,
  ): Promise<void> {
    await this.runOrThrow([
      "-n",
      namespace,
      "wait",
      `--for=condition=${condition}`,
      `${kind}/${name}`,
      `--timeout=${timeoutSeconds}s`,
    ]);
  }

  async exec(namespace: string, pod: string, script: string): Promise<string> {
    const result = await this.runOrThrow(["-n", namespace, "exec", pod, "--", "sh", "-lc", script]);
    return result.stdout;
  }

  async execToFile(namespace: string, pod: string, script: string, localFile: string): Promise<void> {
    await this.runOrThrow(["-n", namespace, "exec", pod, "--", "sh", "-lc", script], {
      stdoutFile: localFile,
    });
  }

  async copyToPod(
    namespace: string,
    pod: string,
    localPath: string,
    remotePath: string,
  ): Promise<void> {
    await this.runOrThrow(["-n", namespace, "cp", localPath, `${pod}:${remotePath}`]);
  }

  async syncFromPod(
    namespace: string,
    pod: string,
    remotePath: string,
    localDir: string,
  ): Promise<void> {
    await this.runOrThrow(["-n", namespace, "rsync", `${pod}:${remotePath}`, withSlash(localDir)]);
  }

  async syncToPod(
    namespace: string,
    pod: string,
    localPath: string,
    remoteDir: string,
  ): Promise<void> {
    await this.runOrThrow(["-n", namespace, "rsync", localPath, `${pod}:${withSlash(remoteDir)}`]);
  }
}

function namespaceArgs(namespace: string | undefined): string[] {
  return namespace ? ["-n", namespace] : [];
}

function withSlash(dir: string): string {
  return dir.endsWith("/") ? dir : `${dir}/`;
}

const SECRET_FLAGS = new Set(["--token", "-p"]);

/**
 * Mask secrets in an argument list before it is logged or put in an error
 */
export function redact(args: string[]): string[] {
  return args.map((arg, i) => {
    const previous = i > 0 ? args[i - 1] : undefined;
    return previous !== undefined && SECRET_FLAGS.has(previous) ? "***" : arg;
  });
}

