import { FakeRunner } from './fake-runner'
import { cargoMetadataJson } from './temp-project'

export const SERVICE_URL = 'https://svc-abc123-uc.a.run.app'

/** `run services describe --format json` output. */
export function serviceJson(opts: { readonly ready: string; readonly message?: string; readonly url?: string } = { ready: 'True' }): string {
  return JSON.stringify({
    metadata: { name: 'svc', generation: 1 },
    status: {
      observedGeneration: 1,
      url: opts.url ?? SERVICE_URL,
      latestReadyRevisionName: 'svc-00001-abc',
      conditions: [{ type: 'Ready', status: opts.ready, message: opts.message }]
    }
  })
}

/** git and cargo answers for a clean crate named `svc` rooted at `cwd`. */
export function stubLocalTools(runner: FakeRunner, cwd: string, files: readonly string[] = ['Cargo.toml', 'runway.json', 'src/main.rs']): FakeRunner {
  return runner
    .on('git', ['status', '--porcelain'], { stdout: '' })
    .on('git', ['ls-files', '--cached'], { stdout: files.map(f => `${f}\0`).join('') })
    .on('git', ['ls-files', '--deleted'], { stdout: '' })
    .on('cargo', ['metadata'], { stdout: cargoMetadataJson(cwd) })
}

/** Active account plus every API reported enabled (`services list` echoes the filtered name). */
export function stubPreflight(runner: FakeRunner, account = 'dev@example.com'): FakeRunner {
  return runner
    .on('gcloud', ['config', 'get-value', 'account'], { stdout: `${account}\n` })
    .add((bin, args) => {
      if (bin !== 'gcloud' || args[0] !== 'services' || args[1] !== 'list') return undefined
      const filter = args.find(a => a.startsWith('config.name=')) ?? ''
      return { stdout: `${filter.slice('config.name='.length)}\n` }
    })
}

/** gcloud answers for a deploy that succeeds end to end. */
export function stubSuccessfulCloud(runner: FakeRunner, secrets: readonly string[] = []): FakeRunner {
  return stubPreflight(runner)
    .on('gcloud', ['artifacts', 'repositories', 'describe'], { stdout: '' })
    .on('gcloud', ['builds', 'submit'], { stdout: 'build-123\n' })
    .on('gcloud', ['builds', 'describe'], { stdout: JSON.stringify({ id: 'build-123', status: 'SUCCESS' }) })
    .on('gcloud', ['secrets', 'list'], { stdout: secrets.map(s => `${s}\n`).join('') })
    .on('gcloud', ['run', 'deploy'], { stdout: '' })
    .on('gcloud', ['run', 'services', 'describe'], { stdout: serviceJson() })
}
