/** Where `ci init` writes the workflow, relative to the project root. */
export const WORKFLOW_PATH = '.github/workflows/runway-deploy.yml'

export interface WorkflowOptions {
  /** Pushes to this branch deploy. */
  readonly branch: string
  /** `@runway/cli` version the job installs. */
  readonly cliVersion: string
}

/**
 * GitHub Actions workflow that authenticates through Workload Identity
 * Federation and runs `runway deploy`. Secrets are referenced, never inlined.
 */
export function renderWorkflow(opts: WorkflowOptions): string {
  const lines: string[] = [
    '# Written by `runway ci init`. Remove with `runway destroy --include-ci`.',
    'name: Deploy to Cloud Run',
    '',
    'on:',
    '  push:',
    `    branches: [${opts.branch}]`,
    '  workflow_dispatch:',
    '',
    'concurrency:',
    '  group: runway-deploy',
    '  cancel-in-progress: false',
    '',
    'jobs:',
    '  deploy:',
    '    runs-on: ubuntu-latest',
    '    permissions:',
    '      contents: read',
    '      id-token: write',
    '    steps:',
    '      - uses: actions/checkout@v4',
    '',
    '      - uses: google-github-actions/auth@v2',
    '        with:',
    '          project_id: ${{ secrets.GCP_PROJECT_ID }}',
    '          workload_identity_provider: ${{ secrets.WIF_PROVIDER }}',
    '          service_account: ${{ secrets.WIF_SERVICE_ACCOUNT }}',
    '',
    '      - uses: google-github-actions/setup-gcloud@v2',
    '',
    '      - uses: actions/setup-node@v4',
    '        with:',
    '          node-version: 20',
    '',
    '      - name: Deploy',
    `        run: npx --yes @runway/cli@${opts.cliVersion} deploy --ndjson`,
    ''
  ]
  return lines.join('\n')
}
