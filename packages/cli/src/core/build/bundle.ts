import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { BUNDLE_DIR, EJECT_DIR, LocalIOError, LocalValidationError, type BuildArtifact, type ProcessRunner } from '@runway/core'
import { mapLimit } from '../../utils/concurrency'

/** Paths that never enter a bundle. */
export const ALWAYS_EXCLUDED: readonly string[] = ['.git', EJECT_DIR, BUNDLE_DIR]

/** `./src/` → `src`, `a\\b` → `a/b`, `.` → `` (whole tree). */
export function normalizeIncludePath(p: string): string {
  let out = p.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/')
  while (out.startsWith('./')) out = out.slice(2)
  if (out === '.') out = ''
  return out.replace(/\/+$/, '')
}

function under(file: string, prefix: string): boolean {
  return file === prefix || file.startsWith(prefix + '/')
}

export function isAlwaysExcluded(file: string): boolean {
  return ALWAYS_EXCLUDED.some(p => under(file, p))
}

/** True when `file` is an include entry or lies below one. */
export function inIncludeClosure(file: string, include: readonly string[]): boolean {
  return include.map(normalizeIncludePath).some(p => p === '' || under(file, p))
}

/**
 * (listed − deleted − always-excluded) ∩ include closure, sorted.
 * Without an include list (or with an empty one) everything listed is kept.
 */
export function selectBundleFiles(listed: readonly string[], deleted: readonly string[], include?: readonly string[]): string[] {
  const gone = new Set(deleted)
  const out = new Set<string>()
  for (const f of listed) {
    if (!f || gone.has(f) || isAlwaysExcluded(f)) continue
    if (include && include.length > 0 && !inIncludeClosure(f, include)) continue
    out.add(f)
  }
  return [...out].sort()
}

function splitZ(s: string): string[] {
  return s.split('\0').filter(x => x.length > 0)
}

async function git(runner: ProcessRunner, cwd: string, args: readonly string[]): Promise<string> {
  const res = await runner.exec('git', args, { cwd, timeoutMs: 60_000 }).catch((err: unknown) => {
    throw new LocalIOError(`cannot list project files: ${err instanceof Error ? err.message : String(err)}`, {
      remedy: 'Install git and run Runway inside a git repository',
      cause: err
    })
  })
  if (!res.ok) {
    throw new LocalIOError(`git ${args.join(' ')} failed: ${res.stderr.trim() || `exit code ${String(res.code)}`}`, {
      remedy: 'Run Runway inside a git repository (git init)'
    })
  }
  return res.stdout
}

/** Tracked and untracked-but-not-ignored files, minus deleted ones. */
export async function listProjectFiles(cwd: string, runner: ProcessRunner, include?: readonly string[]): Promise<string[]> {
  const listed = splitZ(await git(runner, cwd, ['ls-files', '--cached', '--others', '--exclude-standard', '-z']))
  const deleted = splitZ(await git(runner, cwd, ['ls-files', '--deleted', '-z']))
  return selectBundleFiles(listed, deleted, include)
}

export interface AssembleArgs {
  readonly cwd: string
  readonly dockerfile: string
  readonly include?: readonly string[]
  readonly runner: ProcessRunner
  /** The Dockerfile was ejected and edited; it may build from other inputs. */
  readonly ejected?: boolean
}

/**
 * Copy the selected files into `.runway-bundle/` (recreated) and write the
 * Dockerfile beside them. Never produces an empty bundle, nor one the
 * rendered Dockerfile cannot build because `Cargo.toml` was left out.
 */
export async function assembleBundle(args: AssembleArgs): Promise<BuildArtifact> {
  const files = await listProjectFiles(args.cwd, args.runner, args.include)
  if (files.length === 0) {
    throw new LocalIOError('no files to bundle', {
      remedy: args.include ? 'Check build.include; it matches no tracked files' : 'Commit or add project files to git'
    })
  }
  if (args.ejected !== true && !files.includes('Cargo.toml')) {
    throw new LocalValidationError('bundle has no Cargo.toml', {
      code: 'MANIFEST_NOT_BUNDLED',
      remedy: 'Add Cargo.toml, Cargo.lock and src to build.include'
    })
  }
  const dir = join(args.cwd, BUNDLE_DIR)
  try {
    await rm(dir, { recursive: true, force: true })
    await mkdir(dir, { recursive: true })
    await mapLimit(files, 16, async (rel) => {
      const target = join(dir, rel)
      await mkdir(dirname(target), { recursive: true })
      await copyFile(join(args.cwd, rel), target)
    })
    await writeFile(join(dir, 'Dockerfile'), args.dockerfile, 'utf8')
  } catch (err) {
    throw new LocalIOError(`cannot assemble bundle in ${dir}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
  }
  return { dockerfile: args.dockerfile, files, dir }
}
