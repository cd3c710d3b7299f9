import {
  classifyRemoteFailure,
  LocalValidationError,
  RemoteAuthError,
  type ExecOptions,
  type ProcessRunner
} from '@runway/core'

/** Repository secrets the generated workflow reads. */
export const GH_SECRET_NAMES = ['GCP_PROJECT_ID', 'WIF_PROVIDER', 'WIF_SERVICE_ACCOUNT'] as const
export type GhSecretName = typeof GH_SECRET_NAMES[number]

const GH_TIMEOUT_MS = 60_000

/**
 * `owner/repo` from a GitHub remote URL, or undefined for anything else.
 * Accepts scp-style SSH, ssh:// and http(s):// forms, with or without `.git`.
 */
export function parseGitHubRepo(url: string): string | undefined {
  const m = url.trim().match(/^(?:git@github\.com:|ssh:\/\/git@github\.com\/|https?:\/\/(?:[^@/]+@)?github\.com\/)(.+?)(?:\.git)?\/?$/)
  const path = m?.[1]
  if (path === undefined || !/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/.test(path)) return undefined
  return path
}

/** Thin wrapper over the GitHub CLI. Login failures point at `gh auth login`. */
export class GitHubCli {
  private readonly runner: ProcessRunner
  private readonly cwd: string
  private readonly bin: string

  public constructor(runner: ProcessRunner, cwd: string, bin: string = 'gh') {
    this.runner = runner
    this.cwd = cwd
    this.bin = bin
  }

  private async run(operation: string, args: readonly string[], opts?: ExecOptions): Promise<string> {
    const res = await this.runner.exec(this.bin, args, { cwd: this.cwd, timeoutMs: GH_TIMEOUT_MS, ...opts })
    if (res.ok) return res.stdout
    const err = classifyRemoteFailure(res.stderr || res.stdout, operation)
    if (err instanceof RemoteAuthError) throw new RemoteAuthError(err.message, { operation, remedy: 'Run: gh auth login' })
    throw err
  }

  /** First line of `gh --version`, e.g. `2.40.1 (2023-12-13)`. */
  public async version(): Promise<string> {
    const out = await this.run('gh --version', ['--version'])
    const first = out.split(/\r?\n/)[0]?.trim() ?? ''
    return first.replace(/^gh version\s+/, '')
  }

  public async authStatus(): Promise<void> {
    await this.run('gh auth status', ['auth', 'status'])
  }

  /** `owner/repo` of the `origin` remote of the working tree. */
  public async repository(): Promise<string> {
    const res = await this.runner.exec('git', ['remote', 'get-url', 'origin'], { cwd: this.cwd, timeoutMs: GH_TIMEOUT_MS })
    if (!res.ok) {
      throw new LocalValidationError('no git remote named origin', { code: 'NO_GITHUB_REMOTE', remedy: 'Run: git remote add origin git@github.com:<owner>/<repo>.git' })
    }
    const url = res.stdout.trim()
    const repo = parseGitHubRepo(url)
    if (repo === undefined) {
      throw new LocalValidationError(`origin is not a GitHub repository: ${url}`, { code: 'NO_GITHUB_REMOTE', remedy: 'Point origin at a github.com repository' })
    }
    return repo
  }

  /** Value goes over stdin so it never appears in an argument list. */
  public async setSecret(repo: string, name: GhSecretName, value: string): Promise<void> {
    await this.run('gh secret set', ['secret', 'set', name, '--repo', repo], { stdin: value })
  }

  public async deleteSecret(repo: string, name: GhSecretName): Promise<void> {
    await this.run('gh secret delete', ['secret', 'delete', name, '--repo', repo])
  }
}
