/**
 * Pipeline definition file and string parser.
 *
 * Reads YAML or JSON pipeline files/strings and returns raw parsed objects
 * (before Zod validation). Format is determined by file extension for file-based
 * loading, or explicitly specified for string-based loading.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parse } from 'js-yaml'
import { PipelineDefinitionError } from '../../core/errors.js'
import type { RawPipeline } from './schemas.js'

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export type PipelineFormat = 'yaml' | 'json'

export function detectFormat(filePath: string): PipelineFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

// ---------------------------------------------------------------------------
// parsePipelineString
// ---------------------------------------------------------------------------

/**
 * Parse a pipeline definition from a string (YAML or JSON).
 * Returns the raw parsed object before Zod validation.
 *
 * @throws {PipelineDefinitionError} on syntax errors
 */
export function parsePipelineString(content: string, format: PipelineFormat): RawPipeline {
  try {
    return format === 'json' ? (JSON.parse(content) as unknown) : parse(content)
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    const label = format === 'json' ? 'JSON' : 'YAML'
    throw new PipelineDefinitionError(`${label} parse error: ${original.message}`, [original.message], { format })
  }
}

// ---------------------------------------------------------------------------
// parsePipelineFile
// ---------------------------------------------------------------------------

/**
 * Read a pipeline definition file and parse its contents.
 *
 * @throws {PipelineDefinitionError} on file read errors or syntax errors
 */
export function parsePipelineFile(filePath: string): RawPipeline {
  let content: string

  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new PipelineDefinitionError(`Failed to read pipeline file: ${original.message}`, [original.message], {
      filePath,
    })
  }

  try {
    return parsePipelineString(content, detectFormat(filePath))
  } catch (err) {
    if (err instanceof PipelineDefinitionError) {
      throw new PipelineDefinitionError(`${filePath}: ${err.message}`, err.errors, { filePath })
    }
    throw err
  }
}
