import { LocalValidationError, type BuildSection, type ProjectMetadata } from '@runway/core'
import { normalizeIncludePath } from './bundle'

/**
 * `ENV` value, double-quoted when it holds anything beyond plain word
 * characters. Inside the quotes `\\`, `"` and `$` are backslash-escaped so
 * the builder neither ends the string nor expands variables.
 */
export function envValue(key: string, v: string): string {
  if (v.length > 0 && /^[A-Za-z0-9_./:@%+,=-]*$/.test(v)) return v
  if (/[\r\n]/.test(v)) {
    throw new LocalValidationError(`build.env.${key} spans several lines`, {
      code: 'INVALID_ENV',
      remedy: 'Keep build.env values on one line; store multi-line values as secrets'
    })
  }
  return `"${v.replace(/[\\"$]/g, c => `\\${c}`)}"`
}

function aptLine(packages: readonly string[]): string[] {
  if (packages.length === 0) return []
  return [`RUN apt-get update && apt-get install -y ${packages.join(' ')} && rm -rf /var/lib/apt/lists/*`]
}

/**
 * Render the four-stage container build definition.
 *
 * Pure and byte-stable: the same inputs give identical text. Env keys are
 * sorted; extra packages and include paths keep their configured order.
 */
export function renderDockerfile(build: BuildSection, meta: ProjectMetadata, port: number): string {
  const bin = meta.binaryName
  const includes = (build.include ?? []).map(normalizeIncludePath).filter(p => p.length > 0)
  const env = Object.keys(build.env).sort().map(k => `ENV ${k}=${envValue(k, build.env[k] ?? '')}`)
  const lines: string[] = [
    '# Base: cargo-chef installed once',
    `FROM ${build.baseImage} AS chef`,
    `RUN cargo install cargo-chef --version ${build.cargoChefVersion} --locked`,
    'WORKDIR /app',
    '',
    '# Stage 1: planner',
    'FROM chef AS planner',
    'COPY . .',
    'RUN cargo chef prepare --recipe-path recipe.json',
    '',
    '# Stage 2: cacher (dependencies only)',
    'FROM chef AS cacher',
    ...aptLine(build.extraPackages),
    'COPY --from=planner /app/recipe.json recipe.json',
    'RUN cargo chef cook --release --recipe-path recipe.json',
    '',
    '# Stage 3: builder',
    'FROM chef AS builder',
    ...aptLine(build.extraPackages),
    'COPY --from=cacher /app/target target',
    'COPY --from=cacher /usr/local/cargo /usr/local/cargo',
    'COPY . .',
    `RUN cargo build --release --bin ${bin}`,
    '',
    '# Stage 4: runtime',
    `FROM ${build.runtimeImage}`,
    'WORKDIR /app',
    `COPY --from=builder /app/target/release/${bin} /usr/local/bin/app`,
    ...includes.map(p => `COPY --from=builder /app/${p} /app/${p}`),
    ...env,
    `ENV PORT=${port}`,
    `EXPOSE ${port}`,
    'CMD ["app"]'
  ]
  return lines.join('\n') + '\n'
}
