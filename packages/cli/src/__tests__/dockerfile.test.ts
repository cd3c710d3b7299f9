import { describe, it, expect } from 'vitest'
import { DEFAULT_BUILD, LocalValidationError, type BuildSection, type ProjectMetadata } from '@runway/core'
import { envValue, renderDockerfile } from '../core/build/dockerfile'

const meta: ProjectMetadata = { name: 'svc', version: '0.1.0', binaryName: 'svc' }

const build: BuildSection = {
  ...DEFAULT_BUILD,
  extraPackages: ['pkg-config', 'libssl-dev'],
  include: ['./static/'],
  env: { RUST_LOG: 'info', GREETING: 'hello world' }
}

describe('renderDockerfile', () => {
  it('is byte-identical for identical inputs', () => {
    expect(renderDockerfile(build, meta, 8080)).toBe(renderDockerfile({ ...build, env: { GREETING: 'hello world', RUST_LOG: 'info' } }, meta, 8080))
  })

  it('keeps the four stages in order', () => {
    const lines = renderDockerfile(build, meta, 8080).split('\n')
    const stages = ['FROM rust:1.84-bookworm AS chef', 'FROM chef AS planner', 'FROM chef AS cacher', 'FROM chef AS builder', 'FROM gcr.io/distroless/cc-debian12']
      .map(s => lines.indexOf(s))
    expect(stages.every(i => i >= 0)).toBe(true)
    expect([...stages].sort((a, b) => a - b)).toEqual(stages)
  })

  it('installs extra packages in the cacher and builder stages', () => {
    const lines = renderDockerfile(build, meta, 8080).split('\n')
    const apt = 'RUN apt-get update && apt-get install -y pkg-config libssl-dev && rm -rf /var/lib/apt/lists/*'
    expect(lines.filter(l => l === apt)).toHaveLength(2)
    expect(lines.indexOf(apt)).toBe(lines.indexOf('FROM chef AS cacher') + 1)
    expect(lines.lastIndexOf(apt)).toBe(lines.indexOf('FROM chef AS builder') + 1)
  })

  it('omits the apt step without extra packages', () => {
    expect(renderDockerfile(DEFAULT_BUILD, meta, 8080)).not.toContain('apt-get')
  })

  it('renders the runtime stage from binary, includes, env and port', () => {
    const lines = renderDockerfile(build, meta, 3000).split('\n')
    expect(lines.slice(lines.indexOf('# Stage 4: runtime'))).toEqual([
      '# Stage 4: runtime',
      'FROM gcr.io/distroless/cc-debian12',
      'WORKDIR /app',
      'COPY --from=builder /app/target/release/svc /usr/local/bin/app',
      'COPY --from=builder /app/static /app/static',
      'ENV GREETING="hello world"',
      'ENV RUST_LOG=info',
      'ENV PORT=3000',
      'EXPOSE 3000',
      'CMD ["app"]',
      ''
    ])
  })

  it('builds the selected binary and pins cargo-chef', () => {
    const text = renderDockerfile(DEFAULT_BUILD, { ...meta, binaryName: 'api-server' }, 8080)
    expect(text).toContain('RUN cargo install cargo-chef --version 0.1.68 --locked\n')
    expect(text).toContain('RUN cargo build --release --bin api-server\n')
    expect(text).toContain('COPY --from=builder /app/target/release/api-server /usr/local/bin/app\n')
  })

  it('escapes dollar signs, quotes and backslashes in ENV values', () => {
    const text = renderDockerfile({ ...DEFAULT_BUILD, env: { DB_PASS: 'pa$word', QUOTE: 'say "hi"', WIN: 'C:\\tmp' } }, meta, 8080)
    const env = text.split('\n').filter(l => l.startsWith('ENV '))
    expect(env).toEqual([
      'ENV DB_PASS="pa\\$word"',
      'ENV QUOTE="say \\"hi\\""',
      'ENV WIN="C:\\\\tmp"',
      'ENV PORT=8080'
    ])
  })
})

describe('envValue', () => {
  it('leaves plain values bare and quotes the empty string', () => {
    expect(envValue('A', 'postgres://db:5432/app')).toBe('postgres://db:5432/app')
    expect(envValue('A', '')).toBe('""')
  })

  it('rejects values spanning several lines', () => {
    expect(() => envValue('CERT', 'line1\nline2')).toThrow(LocalValidationError)
    expect(() => envValue('CERT', 'line1\nline2')).toThrow('build.env.CERT spans several lines')
  })
})
