/**
 * @packageDocumentation
 * Cloud Run provider: remote operations for @runway/cli, built on the
 * @runway/core ProcessRunner.
 */
export {
  CloudRunClient,
  GITHUB_OIDC_ISSUER,
  TERMINAL_BUILD_STATUSES,
  artifactImageTag,
  computeServiceAccount,
  joinListFlag,
  serviceAccountEmail,
  workloadIdentityProviderName
} from "./client";
export type {
  BuildInfo,
  CloudRunClientOptions,
  PollSettings,
  ReadyStatus,
  EnsureOutcome,
  SecretWrite,
  ServiceDeploySpec,
  ServiceStatus
} from "./client";
