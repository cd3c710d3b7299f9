import { LocalValidationError, RemoteAuthError } from '@runway/core'
import type { CloudRunClient } from '@runway/provider-cloud-run'
import { REQUIRED_APIS } from '../doctor/checks'

/**
 * First remote step of a deploy or CI bootstrap: an active gcloud account and
 * every required API enabled. Reads only; nothing is created on failure.
 */
export async function preflight(client: CloudRunClient, projectId: string, extraApis: readonly string[] = []): Promise<void> {
  const account = await client.activeAccount()
  if (!account) throw new RemoteAuthError('no active gcloud account', { operation: 'config get-value' })
  const states = await Promise.all([...REQUIRED_APIS.map(([, api]) => api), ...extraApis].map(async api => ({ api, enabled: await client.apiEnabled(projectId, api) })))
  const disabled = states.filter(s => !s.enabled).map(s => s.api)
  if (disabled.length === 0) return
  throw new LocalValidationError(`required APIs not enabled: ${disabled.join(', ')}`, {
    code: 'APIS_DISABLED',
    remedy: `Run: gcloud services enable ${disabled.join(' ')} --project ${projectId}`
  })
}
