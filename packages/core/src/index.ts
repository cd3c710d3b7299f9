/**
 * @packageDocumentation
 * Public API for @runway/core
 */
export type { ProcessRunner, ExecOptions, SpawnOptions, ExecResult, SpawnCtl } from './process/runner'
export { NodeProcessRunner } from './process/runner'
export type { ErrorKind, ErrorInfo, RunwayErrorOptions, RemoteErrorOptions } from './errors'
export {
  RunwayError,
  RemoteError,
  LocalValidationError,
  LocalIOError,
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  RemoteQuotaError,
  RemoteUnknownError,
  TimeoutError,
  CancelledError,
  LaunchFailedError,
  classifyRemoteFailure,
  isRunwayError,
  toRunwayError
} from './errors'
export type { PollOptions } from './poll'
export { pollUntil } from './poll'
export type { RunwayConfig, ProjectSection, BuildSection, ServiceSection, DeploySection, RemoteTarget } from './contracts/config'
export { CONFIG_FILE, BUNDLE_DIR, EJECT_DIR, ARTIFACT_REPOSITORY, DEFAULT_REGION, DEFAULT_BUILD, DEFAULT_SERVICE, DEFAULT_DEPLOY } from './contracts/config'
export type { ProjectMetadata } from './contracts/metadata'
export type { CheckStatus, CheckResult, DoctorReport } from './contracts/doctor'
export type { BuildArtifact, DeployPlan, DeployPhase, DeployState, TerminalDeployState } from './contracts/deploy'
export { isTerminal } from './contracts/deploy'
export type { RunwayAction, RunwayEvent, RunwaySummary } from './events/types'
export { evt, summary } from './events/emit'
