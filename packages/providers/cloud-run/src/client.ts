import {
  ARTIFACT_REPOSITORY,
  NodeProcessRunner,
  RemoteNotFoundError,
  RemoteUnknownError,
  classifyRemoteFailure,
  pollUntil,
  type ExecOptions,
  type ExecResult,
  type ProcessRunner,
  type ServiceSection,
  type SpawnCtl
} from "@runway/core";
import { isRecord, lines, num, parseObject, str, type Json } from "./parse";

/** Cloud Build statuses after which a build never changes again. */
export const TERMINAL_BUILD_STATUSES: ReadonlySet<string> = new Set([
  "SUCCESS",
  "FAILURE",
  "INTERNAL_ERROR",
  "TIMEOUT",
  "CANCELLED",
  "EXPIRED"
]);

export interface BuildInfo {
  readonly id: string;
  readonly status: string;
  readonly statusDetail?: string;
  readonly logUrl?: string;
}

export type ReadyStatus = "True" | "False" | "Unknown";

export interface ServiceStatus {
  readonly name: string;
  readonly url?: string;
  /** Ready condition of the latest generation; `Unknown` while it is still rolling out. */
  readonly ready: ReadyStatus;
  readonly message?: string;
  readonly latestRevision?: string;
}

export interface ServiceDeploySpec {
  readonly name: string;
  readonly image: string;
  readonly projectId: string;
  readonly region: string;
  readonly service: ServiceSection;
  readonly env?: Readonly<Record<string, string>>;
  /** Secret names; each is mounted as the env var of the same name. */
  readonly secrets?: readonly string[];
}

export interface PollSettings {
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface CloudRunClientOptions {
  readonly runner?: ProcessRunner;
  /** gcloud executable; defaults to `RUNWAY_GCLOUD_BIN` or `gcloud`. */
  readonly bin?: string;
  readonly redactors?: readonly RegExp[];
}

export type SecretWrite = "created" | "updated";
/** Outcome of a describe-then-create call. */
export type EnsureOutcome = "exists" | "created";

const SHORT_MS = 60_000;
const LONG_MS = 15 * 60_000;

/** `REGION-docker.pkg.dev/PROJECT/REPO/SERVICE:latest` */
export function artifactImageTag(projectId: string, region: string, service: string, repo: string = ARTIFACT_REPOSITORY): string {
  return `${region}-docker.pkg.dev/${projectId}/${repo}/${service}:latest`;
}

export const GITHUB_OIDC_ISSUER = "https://token.actions.githubusercontent.com";

/** `ID@PROJECT.iam.gserviceaccount.com` */
export function serviceAccountEmail(accountId: string, projectId: string): string {
  return `${accountId}@${projectId}.iam.gserviceaccount.com`;
}

/** Full resource name GitHub's auth action expects as `workload_identity_provider`. */
export function workloadIdentityProviderName(projectNumber: string, poolId: string, providerId: string): string {
  return `projects/${projectNumber}/locations/global/workloadIdentityPools/${poolId}/providers/${providerId}`;
}

/** Default runtime identity of Cloud Run services in a project. */
export function computeServiceAccount(projectNumber: string): string {
  return `${projectNumber}-compute@developer.gserviceaccount.com`;
}

/**
 * Join `K=V` pairs for a gcloud list flag. Values containing a comma switch to
 * gcloud's alternate delimiter syntax (`^|^K=V|K=V`).
 */
export function joinListFlag(pairs: readonly string[]): string {
  if (!pairs.some(p => p.includes(","))) return pairs.join(",");
  return `^|^${pairs.join("|")}`;
}

/**
 * @public
 * Remote operations for Cloud Build, Cloud Run, Artifact Registry and Secret
 * Manager, all through the gcloud CLI. Holds no state besides its runner.
 */
export class CloudRunClient {
  private readonly runner: ProcessRunner;
  public readonly bin: string;
  private readonly redactors?: readonly RegExp[];

  public constructor(opts: CloudRunClientOptions = {}) {
    this.runner = opts.runner ?? new NodeProcessRunner();
    this.bin = opts.bin ?? process.env.RUNWAY_GCLOUD_BIN ?? "gcloud";
    this.redactors = opts.redactors;
  }

  private async raw(args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    return await this.runner.exec(this.bin, args, { timeoutMs: SHORT_MS, redactors: this.redactors, ...opts });
  }

  /** Run and return stdout; nonzero exit becomes a classified remote error. */
  private async run(operation: string, args: readonly string[], opts?: ExecOptions): Promise<string> {
    const res = await this.raw(args, opts);
    if (!res.ok) throw classifyRemoteFailure(res.stderr || res.stdout, operation);
    return res.stdout;
  }

  public async version(): Promise<string> {
    const out = await this.run("version", ["version"]);
    const first = out.split(/\r?\n/)[0]?.trim() ?? "";
    return first.startsWith("Google Cloud SDK ") ? first.slice("Google Cloud SDK ".length).trim() : first;
  }

  /** Active account, or `''` when none is configured. */
  public async activeAccount(): Promise<string> {
    const out = (await this.run("config get-value", ["config", "get-value", "account"])).trim();
    return out === "(unset)" ? "" : out;
  }

  public async describeProject(projectId: string): Promise<string> {
    return (await this.run("projects describe", ["projects", "describe", projectId, "--format", "value(name)"])).trim();
  }

  public async projectNumber(projectId: string): Promise<string> {
    const n = (await this.run("projects describe", ["projects", "describe", projectId, "--format", "value(projectNumber)"])).trim();
    if (!n) throw new RemoteUnknownError(`project ${projectId} has no project number`, { operation: "projects describe" });
    return n;
  }

  public async billingEnabled(projectId: string): Promise<boolean> {
    const out = await this.run("billing projects describe", ["billing", "projects", "describe", projectId, "--format", "value(billingEnabled)"]);
    return out.trim().toLowerCase() === "true";
  }

  public async apiEnabled(projectId: string, api: string): Promise<boolean> {
    const out = await this.run("services list", ["services", "list", "--project", projectId, "--filter", `config.name=${api}`, "--format", "value(config.name)"]);
    return out.trim().length > 0;
  }

  public async enableApi(projectId: string, api: string): Promise<void> {
    await this.run("services enable", ["services", "enable", api, "--project", projectId, "--quiet"], { timeoutMs: LONG_MS });
  }

  /** Describe a resource; create it only when the describe call says it does not exist. */
  private async ensure(describe: readonly string[], create: readonly string[], operation: string): Promise<EnsureOutcome> {
    const res = await this.raw(describe);
    if (res.ok) return "exists";
    const err = classifyRemoteFailure(res.stderr, `${operation} describe`);
    if (!(err instanceof RemoteNotFoundError)) throw err;
    await this.run(`${operation} create`, create, { timeoutMs: LONG_MS });
    return "created";
  }

  public async ensureArtifactRepo(projectId: string, region: string, repo: string = ARTIFACT_REPOSITORY): Promise<EnsureOutcome> {
    return await this.ensure(
      ["artifacts", "repositories", "describe", repo, "--project", projectId, "--location", region],
      ["artifacts", "repositories", "create", repo, "--project", projectId, "--location", region, "--repository-format", "docker", "--quiet"],
      "artifacts repositories"
    );
  }

  /** Upload `dir` and queue a build; returns the build id without waiting. */
  public async submitBuild(dir: string, projectId: string, tag: string): Promise<string> {
    const out = await this.run("builds submit", [
      "builds", "submit", dir,
      "--project", projectId,
      "--tag", tag,
      "--async",
      "--quiet",
      "--format", "value(id)"
    ], { timeoutMs: LONG_MS });
    const id = lines(out).pop();
    if (!id) throw new RemoteUnknownError("builds submit did not print a build id", { operation: "builds submit" });
    return id;
  }

  public async getBuild(id: string, projectId: string): Promise<BuildInfo> {
    const out = await this.run("builds describe", ["builds", "describe", id, "--project", projectId, "--format", "json"]);
    const obj = parseObject(out, "builds describe");
    const status = str(obj.status);
    if (!status) throw new RemoteUnknownError(`build ${id} has no status`, { operation: "builds describe" });
    return { id: str(obj.id) ?? id, status, statusDetail: str(obj.statusDetail), logUrl: str(obj.logUrl) };
  }

  /**
   * Poll a build until it reaches a terminal status. Anything but `SUCCESS`
   * throws the classified status detail.
   */
  public async waitForBuild(id: string, projectId: string, poll: PollSettings): Promise<BuildInfo> {
    const build = await pollUntil(
      () => this.getBuild(id, projectId),
      b => TERMINAL_BUILD_STATUSES.has(b.status),
      { ...poll, label: `build ${id}` }
    );
    if (build.status === "SUCCESS") return build;
    throw classifyRemoteFailure(build.statusDetail ?? `build ${id} finished with status ${build.status}`, "builds describe");
  }

  /** Arguments of `gcloud run deploy` for a spec; env and secrets are sorted. */
  public static deployArgs(spec: ServiceDeploySpec): string[] {
    const s = spec.service;
    const args: string[] = [
      "run", "deploy", spec.name,
      "--image", spec.image,
      "--project", spec.projectId,
      "--region", spec.region,
      "--platform", "managed",
      "--memory", s.memory,
      "--cpu", String(s.cpu),
      "--min-instances", String(s.minInstances),
      "--max-instances", String(s.maxInstances),
      "--concurrency", String(s.concurrency),
      "--port", String(s.port),
      "--allow-unauthenticated",
      "--async",
      "--quiet"
    ];
    const env = Object.keys(spec.env ?? {}).sort().map(k => `${k}=${spec.env?.[k] ?? ""}`);
    if (env.length > 0) args.push("--update-env-vars", joinListFlag(env));
    const secrets = [...(spec.secrets ?? [])].sort().map(k => `${k}=${k}:latest`);
    if (secrets.length > 0) args.push("--update-secrets", secrets.join(","));
    return args;
  }

  /** Start a rollout; use {@link waitForService} for the outcome. */
  public async deployService(spec: ServiceDeploySpec): Promise<void> {
    await this.run("run deploy", CloudRunClient.deployArgs(spec), { timeoutMs: LONG_MS });
  }

  public async describeService(name: string, projectId: string, region: string): Promise<ServiceStatus> {
    const out = await this.run("run services describe", ["run", "services", "describe", name, "--project", projectId, "--region", region, "--format", "json"]);
    const obj = parseObject(out, "run services describe");
    const metadata: Json = isRecord(obj.metadata) ? obj.metadata : {};
    const status: Json = isRecord(obj.status) ? obj.status : {};
    const conditions: readonly unknown[] = Array.isArray(status.conditions) ? status.conditions : [];
    const readyCond = conditions.filter(isRecord).find(c => c.type === "Ready");
    const generation = num(metadata.generation);
    const observed = num(status.observedGeneration);
    const current = generation === undefined || (observed !== undefined && observed >= generation);
    let ready: ReadyStatus = "Unknown";
    if (current && readyCond) {
      if (readyCond.status === "True") ready = "True";
      else if (readyCond.status === "False") ready = "False";
    }
    return {
      name: str(metadata.name) ?? name,
      url: str(status.url),
      ready,
      message: readyCond ? str(readyCond.message) : undefined,
      latestRevision: str(status.latestReadyRevisionName) ?? str(status.latestCreatedRevisionName)
    };
  }

  /** Poll until the Ready condition settles. `False` throws the classified condition message. */
  public async waitForService(name: string, projectId: string, region: string, poll: PollSettings): Promise<ServiceStatus> {
    const svc = await pollUntil(
      () => this.describeService(name, projectId, region),
      s => s.ready !== "Unknown",
      { ...poll, label: `service ${name}` }
    );
    if (svc.ready === "True") return svc;
    throw classifyRemoteFailure(svc.message ?? `service ${name} is not ready`, "run services describe");
  }

  public async readLogs(name: string, projectId: string, region: string, limit: number): Promise<string> {
    return await this.run("run services logs read", ["run", "services", "logs", "read", name, "--project", projectId, "--region", region, "--limit", String(limit)]);
  }

  /** Stream new log lines until cancelled. */
  public tailLogs(name: string, projectId: string, region: string, onChunk: (chunk: string) => void): SpawnCtl {
    return this.runner.spawn(this.bin, ["beta", "run", "services", "logs", "tail", name, "--project", projectId, "--region", region], {
      redactors: this.redactors,
      onStdout: onChunk
    });
  }

  /** Create the secret when missing, then add a version holding `value` (sent on stdin). */
  public async setSecret(projectId: string, key: string, value: string): Promise<SecretWrite> {
    const res = await this.raw(["secrets", "describe", key, "--project", projectId]);
    let outcome: SecretWrite = "updated";
    if (!res.ok) {
      const err = classifyRemoteFailure(res.stderr, "secrets describe");
      if (!(err instanceof RemoteNotFoundError)) throw err;
      await this.run("secrets create", ["secrets", "create", key, "--project", projectId, "--replication-policy", "automatic"]);
      outcome = "created";
    }
    await this.run("secrets versions add", ["secrets", "versions", "add", key, "--project", projectId, "--data-file", "-"], { stdin: value });
    return outcome;
  }

  public async grantSecretAccess(projectId: string, key: string, serviceAccount: string): Promise<void> {
    await this.run("secrets add-iam-policy-binding", [
      "secrets", "add-iam-policy-binding", key,
      "--project", projectId,
      "--member", `serviceAccount:${serviceAccount}`,
      "--role", "roles/secretmanager.secretAccessor"
    ]);
  }

  public async listSecrets(projectId: string): Promise<string[]> {
    const out = await this.run("secrets list", ["secrets", "list", "--project", projectId, "--format", "value(name)"]);
    // `value(name)` may print full resource names
    return lines(out).map(l => l.split("/").pop() ?? l);
  }

  public async deleteSecret(projectId: string, key: string): Promise<void> {
    await this.run("secrets delete", ["secrets", "delete", key, "--project", projectId, "--quiet"]);
  }

  public async deleteService(name: string, projectId: string, region: string): Promise<void> {
    await this.run("run services delete", ["run", "services", "delete", name, "--project", projectId, "--region", region, "--quiet"], { timeoutMs: LONG_MS });
  }

  public async deleteImage(tag: string, projectId: string): Promise<void> {
    await this.run("artifacts docker images delete", ["artifacts", "docker", "images", "delete", tag, "--project", projectId, "--delete-tags", "--quiet"], { timeoutMs: LONG_MS });
  }

  /** A pool deleted within the last 30 days still describes, with state DELETED; it is restored, not recreated. */
  public async ensureWorkloadIdentityPool(projectId: string, poolId: string): Promise<EnsureOutcome> {
    const base = ["iam", "workload-identity-pools"];
    const scope = ["--project", projectId, "--location", "global"];
    const res = await this.raw([...base, "describe", poolId, ...scope, "--format", "value(state)"]);
    if (!res.ok) {
      const err = classifyRemoteFailure(res.stderr, "iam workload-identity-pools describe");
      if (!(err instanceof RemoteNotFoundError)) throw err;
      await this.run("iam workload-identity-pools create", [...base, "create", poolId, ...scope, "--display-name", "GitHub Actions"], { timeoutMs: LONG_MS });
      return "created";
    }
    if (res.stdout.trim() !== "DELETED") return "exists";
    await this.run("iam workload-identity-pools undelete", [...base, "undelete", poolId, ...scope, "--quiet"], { timeoutMs: LONG_MS });
    return "created";
  }

  /** OIDC provider trusting GitHub's token issuer, limited to one `owner/repo`. */
  public async ensureGitHubOidcProvider(projectId: string, poolId: string, providerId: string, repo: string): Promise<EnsureOutcome> {
    const base = ["iam", "workload-identity-pools", "providers"];
    const scope = ["--project", projectId, "--location", "global", "--workload-identity-pool", poolId];
    return await this.ensure(
      [...base, "describe", providerId, ...scope],
      [
        ...base, "create-oidc", providerId, ...scope,
        "--issuer-uri", GITHUB_OIDC_ISSUER,
        "--attribute-mapping", "google.subject=assertion.sub,attribute.repository=assertion.repository",
        "--attribute-condition", `assertion.repository=='${repo}'`
      ],
      "iam workload-identity-pools providers"
    );
  }

  public async ensureServiceAccount(projectId: string, accountId: string, displayName: string): Promise<EnsureOutcome> {
    return await this.ensure(
      ["iam", "service-accounts", "describe", serviceAccountEmail(accountId, projectId), "--project", projectId],
      ["iam", "service-accounts", "create", accountId, "--project", projectId, "--display-name", displayName],
      "iam service-accounts"
    );
  }

  /** One binding per role, in order; concurrent policy writes conflict. */
  public async bindProjectRoles(projectId: string, email: string, roles: readonly string[]): Promise<void> {
    for (const role of roles) {
      await this.run("projects add-iam-policy-binding", [
        "projects", "add-iam-policy-binding", projectId,
        "--member", `serviceAccount:${email}`,
        "--role", role,
        "--condition", "None",
        "--quiet"
      ]);
    }
  }

  /** Let workflows of `repo` impersonate `email` through the pool. */
  public async bindWorkloadIdentity(projectId: string, projectNumber: string, poolId: string, email: string, repo: string): Promise<void> {
    await this.run("iam service-accounts add-iam-policy-binding", [
      "iam", "service-accounts", "add-iam-policy-binding", email,
      "--project", projectId,
      "--role", "roles/iam.workloadIdentityUser",
      "--member", `principalSet://iam.googleapis.com/projects/${projectNumber}/locations/global/workloadIdentityPools/${poolId}/attribute.repository/${repo}`
    ]);
  }

  public async deleteServiceAccount(projectId: string, email: string): Promise<void> {
    await this.run("iam service-accounts delete", ["iam", "service-accounts", "delete", email, "--project", projectId, "--quiet"]);
  }

  /** Deleting the pool also deletes its providers. */
  public async deleteWorkloadIdentityPool(projectId: string, poolId: string): Promise<void> {
    await this.run("iam workload-identity-pools delete", ["iam", "workload-identity-pools", "delete", poolId, "--project", projectId, "--location", "global", "--quiet"]);
  }
}
