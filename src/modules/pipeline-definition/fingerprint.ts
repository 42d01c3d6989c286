/**
 * Content fingerprint of the files a pipeline's skip paths select.
 *
 * The fingerprint is a SHA-256 over the ref and, in path order, every
 * matching file's workspace-relative path and contents.
 */

import { createHash } from 'node:crypto'
import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'

/** Directories never walked when collecting workspace files */
export const IGNORED_DIRECTORIES: readonly string[] = ['.git', 'node_modules', '.lattice']

// ---------------------------------------------------------------------------
// Glob matching
// ---------------------------------------------------------------------------

function escapeRegExp(text: string): string {
  return text.replace(/[.+^$()|[\]\\]/g, '\\$&')
}

/**
 * Compile a path glob. Supports `**` (any depth), `*` and `?` within one
 * path segment, and `{a,b}` alternatives. Paths use `/` separators.
 */
export function globToRegExp(glob: string): RegExp {
  const pattern = glob.startsWith('./') ? glob.slice(2) : glob
  let source = ''

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i)
    if (ch === '*') {
      if (pattern.charAt(i + 1) === '*') {
        if (pattern.charAt(i + 2) === '/') {
          source += '(?:.*/)?'
          i += 2
        } else {
          source += '.*'
          i += 1
        }
      } else {
        source += '[^/]*'
      }
    } else if (ch === '?') {
      source += '[^/]'
    } else if (ch === '{') {
      const end = pattern.indexOf('}', i)
      if (end === -1) {
        source += escapeRegExp(ch)
        continue
      }
      const alternatives = pattern.slice(i + 1, end).split(',').map(escapeRegExp)
      source += `(?:${alternatives.join('|')})`
      i = end
    } else {
      source += escapeRegExp(ch)
    }
  }

  return new RegExp(`^${source}$`)
}

export function matchesAny(path: string, globs: readonly RegExp[]): boolean {
  return globs.some((glob) => glob.test(path))
}

// ---------------------------------------------------------------------------
// Workspace walk
// ---------------------------------------------------------------------------

/**
 * Every regular file under `root`, as sorted `/`-separated relative paths.
 * Symbolic links and ignored directories are not followed.
 */
export async function listWorkspaceFiles(
  root: string,
  ignored: readonly string[] = IGNORED_DIRECTORIES,
): Promise<string[]> {
  const files: string[] = []

  const walk = async (relative: string): Promise<void> => {
    const entries = await readdir(join(root, relative), { withFileTypes: true })
    for (const entry of entries) {
      const path = relative === '' ? entry.name : `${relative}/${entry.name}`
      if (entry.isDirectory()) {
        if (!ignored.includes(entry.name)) await walk(path)
      } else if (entry.isFile()) {
        files.push(path)
      }
    }
  }

  await walk('')
  return files.sort()
}

// ---------------------------------------------------------------------------
// computeFingerprint
// ---------------------------------------------------------------------------

export interface FingerprintInput {
  root: string
  /** Path globs; an empty list selects every workspace file */
  paths: readonly string[]
  ref: string
}

export async function computeFingerprint(input: FingerprintInput): Promise<string> {
  const globs = input.paths.map(globToRegExp)
  const files = (await listWorkspaceFiles(input.root)).filter(
    (path) => globs.length === 0 || matchesAny(path, globs),
  )

  const hash = createHash('sha256')
  hash.update(`ref\0${input.ref}\0`)
  for (const path of files) {
    hash.update(`${path}\0`)
    hash.update(await readFile(join(input.root, path)))
    hash.update('\0')
  }
  return hash.digest('hex')
}
