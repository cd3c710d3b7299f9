/**
 * Provider tests for @runway/provider-cloud-run
 */
import { describe, it, expect } from 'vitest'
import { DEFAULT_SERVICE, RemoteNotFoundError, RemotePermissionError, RemoteQuotaError, RemoteUnknownError, TimeoutError } from '@runway/core'
import {
  CloudRunClient,
  artifactImageTag,
  computeServiceAccount,
  joinListFlag,
  serviceAccountEmail,
  workloadIdentityProviderName
} from '../src/index'
import { FakeRunner } from '../../../../tests/helpers/fake-runner'

const fast = { intervalMs: 1, timeoutMs: 2000 }

function client(runner: FakeRunner): CloudRunClient {
  return new CloudRunClient({ runner, bin: 'gcloud' })
}

function serviceJson(opts: { ready: string; generation?: number; observed?: number; message?: string; url?: string }): string {
  return JSON.stringify({
    metadata: { name: 'svc', generation: opts.generation ?? 2 },
    status: {
      observedGeneration: opts.observed ?? 2,
      url: opts.url ?? 'https://svc-abc-uc.a.run.app',
      latestReadyRevisionName: 'svc-00002-xyz',
      conditions: [
        { type: 'ConfigurationsReady', status: 'True' },
        { type: 'Ready', status: opts.ready, message: opts.message }
      ]
    }
  })
}

describe('naming helpers', () => {
  it('builds the Artifact Registry image tag', () => {
    expect(artifactImageTag('p1', 'r1', 'svc')).toBe('r1-docker.pkg.dev/p1/runway/svc:latest')
  })

  it('derives the compute service account', () => {
    expect(computeServiceAccount('123456')).toBe('123456-compute@developer.gserviceaccount.com')
  })

  it('switches delimiter when a value contains a comma', () => {
    expect(joinListFlag(['A=1', 'B=2'])).toBe('A=1,B=2')
    expect(joinListFlag(['A=1,2', 'B=3'])).toBe('^|^A=1,2|B=3')
  })
})

describe('CloudRunClient queries', () => {
  it('parses the SDK version from the first line', async () => {
    const runner = new FakeRunner().on('gcloud', ['version'], { stdout: 'Google Cloud SDK 502.0.0\nbq 2.1.9\ncore 2024.12.06\n' })
    expect(await client(runner).version()).toBe('502.0.0')
  })

  it('treats an unset account as empty', async () => {
    const runner = new FakeRunner().on('gcloud', ['config', 'get-value', 'account'], { stdout: '(unset)\n' })
    expect(await client(runner).activeAccount()).toBe('')
  })

  it('reads billing case-insensitively', async () => {
    const runner = new FakeRunner().on('gcloud', ['billing', 'projects', 'describe'], { stdout: 'True\n' })
    expect(await client(runner).billingEnabled('p1')).toBe(true)
  })

  it('checks an API with the exact filter arguments', async () => {
    const runner = new FakeRunner().on('gcloud', ['services', 'list'], { stdout: '' })
    expect(await client(runner).apiEnabled('p1', 'run.googleapis.com')).toBe(false)
    expect(runner.calls[0]?.args).toEqual(['services', 'list', '--project', 'p1', '--filter', 'config.name=run.googleapis.com', '--format', 'value(config.name)'])
  })

  it('classifies a failing query', async () => {
    const runner = new FakeRunner().on('gcloud', ['projects', 'describe'], { ok: false, stderr: 'ERROR: (gcloud.projects.describe) PERMISSION_DENIED: denied on project p1' })
    const err = await client(runner).describeProject('p1').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RemotePermissionError)
  })

  it('strips resource paths from secret names', async () => {
    const runner = new FakeRunner().on('gcloud', ['secrets', 'list'], { stdout: 'projects/1/secrets/API_KEY\nDB_URL\n\n' })
    expect(await client(runner).listSecrets('p1')).toEqual(['API_KEY', 'DB_URL'])
  })
})

describe('CloudRunClient.ensureArtifactRepo', () => {
  it('creates the repository when describe reports not found', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['artifacts', 'repositories', 'describe'], { ok: false, stderr: 'ERROR: NOT_FOUND: Requested entity was not found.' })
      .on('gcloud', ['artifacts', 'repositories', 'create'], { stdout: '' })
    expect(await client(runner).ensureArtifactRepo('p1', 'r1')).toBe('created')
    expect(runner.calls[1]?.args).toEqual(['artifacts', 'repositories', 'create', 'runway', '--project', 'p1', '--location', 'r1', '--repository-format', 'docker', '--quiet'])
  })

  it('does not create when describe fails for another reason', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['artifacts', 'repositories', 'describe'], { ok: false, stderr: 'PERMISSION_DENIED' })
    await expect(client(runner).ensureArtifactRepo('p1', 'r1')).rejects.toBeInstanceOf(RemotePermissionError)
    expect(runner.find(['artifacts', 'repositories', 'create'])).toHaveLength(0)
  })
})

describe('CloudRunClient CI identity', () => {
  const NOT_FOUND = { ok: false, stderr: 'ERROR: NOT_FOUND: Requested entity was not found.' }

  it('builds service account and provider names', () => {
    expect(serviceAccountEmail('runway-deploy', 'p1')).toBe('runway-deploy@p1.iam.gserviceaccount.com')
    expect(workloadIdentityProviderName('123', 'runway-github', 'github'))
      .toBe('projects/123/locations/global/workloadIdentityPools/runway-github/providers/github')
  })

  it('creates a missing pool', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['iam', 'workload-identity-pools', 'describe'], NOT_FOUND)
      .on('gcloud', ['iam', 'workload-identity-pools', 'create'], { stdout: '' })
    expect(await client(runner).ensureWorkloadIdentityPool('p1', 'runway-github')).toBe('created')
    expect(runner.calls[1]?.args).toEqual([
      'iam', 'workload-identity-pools', 'create', 'runway-github', '--project', 'p1', '--location', 'global', '--display-name', 'GitHub Actions'
    ])
  })

  it('restores a soft-deleted pool instead of creating it', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['iam', 'workload-identity-pools', 'describe'], { stdout: 'DELETED\n' })
      .on('gcloud', ['iam', 'workload-identity-pools', 'undelete'], { stdout: '' })
    expect(await client(runner).ensureWorkloadIdentityPool('p1', 'runway-github')).toBe('created')
    expect(runner.calls.map(c => c.args[2])).toEqual(['describe', 'undelete'])
  })

  it('keeps an active pool', async () => {
    const runner = new FakeRunner().on('gcloud', ['iam', 'workload-identity-pools', 'describe'], { stdout: 'ACTIVE\n' })
    expect(await client(runner).ensureWorkloadIdentityPool('p1', 'runway-github')).toBe('exists')
    expect(runner.calls).toHaveLength(1)
  })

  it('creates a GitHub OIDC provider scoped to one repository', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['iam', 'workload-identity-pools', 'providers', 'describe'], NOT_FOUND)
      .on('gcloud', ['iam', 'workload-identity-pools', 'providers', 'create-oidc'], { stdout: '' })
    expect(await client(runner).ensureGitHubOidcProvider('p1', 'runway-github', 'github', 'acme/svc')).toBe('created')
    expect(runner.calls[1]?.args).toEqual([
      'iam', 'workload-identity-pools', 'providers', 'create-oidc', 'github',
      '--project', 'p1', '--location', 'global', '--workload-identity-pool', 'runway-github',
      '--issuer-uri', 'https://token.actions.githubusercontent.com',
      '--attribute-mapping', 'google.subject=assertion.sub,attribute.repository=assertion.repository',
      '--attribute-condition', "assertion.repository=='acme/svc'"
    ])
  })

  it('leaves an existing service account alone', async () => {
    const runner = new FakeRunner().on('gcloud', ['iam', 'service-accounts', 'describe'], { stdout: '{}' })
    expect(await client(runner).ensureServiceAccount('p1', 'runway-deploy', 'Runway CI deploy')).toBe('exists')
    expect(runner.calls.map(c => c.args)).toEqual([
      ['iam', 'service-accounts', 'describe', 'runway-deploy@p1.iam.gserviceaccount.com', '--project', 'p1']
    ])
  })

  it('binds project roles one at a time', async () => {
    const runner = new FakeRunner().on('gcloud', ['projects', 'add-iam-policy-binding'], { stdout: '' })
    await client(runner).bindProjectRoles('p1', 'ci@p1.iam.gserviceaccount.com', ['roles/run.admin', 'roles/viewer'])
    expect(runner.calls.map(c => c.args[c.args.indexOf('--role') + 1])).toEqual(['roles/run.admin', 'roles/viewer'])
    expect(runner.calls[0]?.args).toEqual([
      'projects', 'add-iam-policy-binding', 'p1',
      '--member', 'serviceAccount:ci@p1.iam.gserviceaccount.com',
      '--role', 'roles/run.admin',
      '--condition', 'None',
      '--quiet'
    ])
  })

  it('binds the pool principal set of one repository', async () => {
    const runner = new FakeRunner().on('gcloud', [], { stdout: '' })
    await client(runner).bindWorkloadIdentity('p1', '123', 'runway-github', 'ci@p1.iam.gserviceaccount.com', 'acme/svc')
    expect(runner.calls[0]?.args).toEqual([
      'iam', 'service-accounts', 'add-iam-policy-binding', 'ci@p1.iam.gserviceaccount.com',
      '--project', 'p1',
      '--role', 'roles/iam.workloadIdentityUser',
      '--member', 'principalSet://iam.googleapis.com/projects/123/locations/global/workloadIdentityPools/runway-github/attribute.repository/acme/svc'
    ])
  })

  it('reports a missing pool as not found on delete', async () => {
    const runner = new FakeRunner().on('gcloud', ['iam', 'workload-identity-pools', 'delete'], NOT_FOUND)
    await expect(client(runner).deleteWorkloadIdentityPool('p1', 'runway-github')).rejects.toBeInstanceOf(RemoteNotFoundError)
    expect(runner.calls[0]?.args).toEqual(['iam', 'workload-identity-pools', 'delete', 'runway-github', '--project', 'p1', '--location', 'global', '--quiet'])
  })
})

describe('CloudRunClient builds', () => {
  it('submits asynchronously and returns the build id', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'submit'], { stdout: 'b-123\n' })
    const tag = artifactImageTag('p1', 'r1', 'svc')
    expect(await client(runner).submitBuild('/tmp/bundle', 'p1', tag)).toBe('b-123')
    expect(runner.calls[0]?.args).toEqual(['builds', 'submit', '/tmp/bundle', '--project', 'p1', '--tag', tag, '--async', '--quiet', '--format', 'value(id)'])
  })

  it('polls until SUCCESS', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'describe'],
      { stdout: JSON.stringify({ id: 'b-1', status: 'QUEUED' }) },
      { stdout: JSON.stringify({ id: 'b-1', status: 'WORKING' }) },
      { stdout: JSON.stringify({ id: 'b-1', status: 'SUCCESS', logUrl: 'https://console.cloud.google.com/cloud-build/builds/b-1' }) })
    const b = await client(runner).waitForBuild('b-1', 'p1', fast)
    expect(b.status).toBe('SUCCESS')
    expect(runner.calls).toHaveLength(3)
  })

  it('turns a failed build into the classified status detail', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'describe'], { stdout: JSON.stringify({ id: 'b-1', status: 'FAILURE', statusDetail: 'quota exceeded' }) })
    const err = await client(runner).waitForBuild('b-1', 'p1', fast).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RemoteQuotaError)
    expect(err).toHaveProperty('message', 'quota exceeded')
  })

  it('reports a build without detail by its status', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'describe'], { stdout: JSON.stringify({ id: 'b-1', status: 'CANCELLED' }) })
    await expect(client(runner).waitForBuild('b-1', 'p1', fast)).rejects.toThrow('build b-1 finished with status CANCELLED')
  })

  it('gives up at the deadline', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'describe'], { stdout: JSON.stringify({ id: 'b-1', status: 'WORKING' }) })
    await expect(client(runner).waitForBuild('b-1', 'p1', { intervalMs: 5, timeoutMs: 20 })).rejects.toBeInstanceOf(TimeoutError)
  })

  it('rejects output that is not JSON', async () => {
    const runner = new FakeRunner().on('gcloud', ['builds', 'describe'], { stdout: 'status: WORKING' })
    await expect(client(runner).getBuild('b-1', 'p1')).rejects.toBeInstanceOf(RemoteUnknownError)
  })
})

describe('CloudRunClient services', () => {
  it('builds deploy arguments with sorted env and secret references', () => {
    const args = CloudRunClient.deployArgs({
      name: 'svc',
      image: 'r1-docker.pkg.dev/p1/runway/svc:latest',
      projectId: 'p1',
      region: 'r1',
      service: DEFAULT_SERVICE,
      env: { RUST_LOG: 'info', APP_MODE: 'prod' },
      secrets: ['DB_URL', 'API_KEY']
    })
    expect(args).toEqual([
      'run', 'deploy', 'svc',
      '--image', 'r1-docker.pkg.dev/p1/runway/svc:latest',
      '--project', 'p1',
      '--region', 'r1',
      '--platform', 'managed',
      '--memory', '512Mi',
      '--cpu', '1',
      '--min-instances', '0',
      '--max-instances', '10',
      '--concurrency', '80',
      '--port', '8080',
      '--allow-unauthenticated',
      '--async',
      '--quiet',
      '--update-env-vars', 'APP_MODE=prod,RUST_LOG=info',
      '--update-secrets', 'API_KEY=API_KEY:latest,DB_URL=DB_URL:latest'
    ])
  })

  it('omits env and secret flags when there are none', () => {
    const args = CloudRunClient.deployArgs({ name: 'svc', image: 'img', projectId: 'p1', region: 'r1', service: DEFAULT_SERVICE })
    expect(args).not.toContain('--update-env-vars')
    expect(args).not.toContain('--update-secrets')
  })

  it('treats a stale generation as not ready yet', async () => {
    const runner = new FakeRunner().on('gcloud', ['run', 'services', 'describe'], { stdout: serviceJson({ ready: 'True', generation: 3, observed: 2 }) })
    const s = await client(runner).describeService('svc', 'p1', 'r1')
    expect(s.ready).toBe('Unknown')
  })

  it('waits for Ready and returns the URL', async () => {
    const runner = new FakeRunner().on('gcloud', ['run', 'services', 'describe'],
      { stdout: serviceJson({ ready: 'Unknown' }) },
      { stdout: serviceJson({ ready: 'True' }) })
    const s = await client(runner).waitForService('svc', 'p1', 'r1', fast)
    expect(s.url).toBe('https://svc-abc-uc.a.run.app')
    expect(s.latestRevision).toBe('svc-00002-xyz')
  })

  it('fails with the condition message when Ready is False', async () => {
    const message = 'Revision svc-00002-xyz is not ready: container failed to start and listen on PORT=8080'
    const runner = new FakeRunner().on('gcloud', ['run', 'services', 'describe'], { stdout: serviceJson({ ready: 'False', message }) })
    const err = await client(runner).waitForService('svc', 'p1', 'r1', fast).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RemoteUnknownError)
    expect(err).toHaveProperty('message', message)
  })
})

describe('CloudRunClient secrets', () => {
  it('creates a missing secret and sends the value on stdin', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['secrets', 'describe'], { ok: false, stderr: 'ERROR: NOT_FOUND: Secret [projects/1/secrets/API_KEY] not found or has no versions.' })
      .on('gcloud', ['secrets', 'create'], { stdout: '' })
      .on('gcloud', ['secrets', 'versions', 'add'], { stdout: '' })
    expect(await client(runner).setSecret('p1', 'API_KEY', 'test-secret')).toBe('created')
    const add = runner.find(['secrets', 'versions', 'add'])
    expect(add[0]?.args).toEqual(['secrets', 'versions', 'add', 'API_KEY', '--project', 'p1', '--data-file', '-'])
    expect(add[0]?.stdin).toBe('test-secret')
    expect(runner.find(['secrets', 'create'])[0]?.args).toEqual(['secrets', 'create', 'API_KEY', '--project', 'p1', '--replication-policy', 'automatic'])
  })

  it('only adds a version to an existing secret', async () => {
    const runner = new FakeRunner()
      .on('gcloud', ['secrets', 'describe'], { stdout: 'name: projects/1/secrets/API_KEY\n' })
      .on('gcloud', ['secrets', 'versions', 'add'], { stdout: '' })
    expect(await client(runner).setSecret('p1', 'API_KEY', 'test-secret')).toBe('updated')
    expect(runner.find(['secrets', 'create'])).toHaveLength(0)
  })

  it('grants accessor to the service account', async () => {
    const runner = new FakeRunner().on('gcloud', ['secrets', 'add-iam-policy-binding'], { stdout: '' })
    await client(runner).grantSecretAccess('p1', 'API_KEY', '42-compute@developer.gserviceaccount.com')
    expect(runner.calls[0]?.args).toEqual([
      'secrets', 'add-iam-policy-binding', 'API_KEY',
      '--project', 'p1',
      '--member', 'serviceAccount:42-compute@developer.gserviceaccount.com',
      '--role', 'roles/secretmanager.secretAccessor'
    ])
  })
})
