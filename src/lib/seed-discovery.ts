/**
 * Seed Discovery
 *
 * Finds seed.yaml manifests in a workspace and turns their produces and
 * consumes sections into edge declarations for the graph.
 *
 * Layout: <workspace>/<org>/<repo>/seed.yaml
 */

import { readFileSync } from 'node:fs'
import { glob } from 'tinyglobby'
import { parse as parseYaml } from 'yaml'
import type { ConsumesDeclaration, ProducesDeclaration } from '../types.js'
import { SeedSchema, formatIssues, type Seed } from './schemas.js'
import { InvalidSeedError } from './errors.js'

export const DEFAULT_SEED_PATTERN = '*/*/seed.yaml'

const IGNORE = ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**']

export interface SeedRecord {
  path: string
  identity: string
  seed: Seed
}

export interface SeedGraph {
  /** Seed identities in lexical order */
  nodes: string[]
  seeds: SeedRecord[]
  declarations: Array<ProducesDeclaration | ConsumesDeclaration>
  /** `<path>: <reason>` for every manifest that failed to load */
  errors: string[]
}

/**
 * Find seed manifests under a workspace, sorted by path
 */
export async function discoverSeeds(
  workspace: string,
  options: { pattern?: string } = {}
): Promise<string[]> {
  const matches = await glob(options.pattern ?? DEFAULT_SEED_PATTERN, {
    cwd: workspace,
    absolute: true,
    onlyFiles: true,
    ignore: IGNORE
  })
  return matches.sort()
}

/**
 * Read and validate one seed.yaml
 *
 * @throws InvalidSeedError
 */
export function readSeed(seedPath: string): Seed {
  let parsed: unknown
  try {
    parsed = parseYaml(readFileSync(seedPath, 'utf-8'))
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    throw new InvalidSeedError(seedPath, cause?.message ?? 'unreadable', cause)
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new InvalidSeedError(seedPath, 'not a YAML mapping')
  }

  const result = SeedSchema.safeParse(parsed)
  if (!result.success) {
    throw new InvalidSeedError(seedPath, formatIssues(result.error))
  }
  return result.data
}

/**
 * `org/repo` identity of a seed, matching the registry entry id
 */
export function seedIdentity(seed: Pick<Seed, 'org' | 'repo'>): string {
  return `${seed.org}/${seed.repo}`
}

function artifactType(item: string | { type: string }): string {
  return typeof item === 'string' ? 'unknown' : item.type
}

/**
 * Load manifests and derive declarations.
 *
 * A consumer's `consumes` item matches every other seed producing the same
 * artifact type; `source` narrows the match to one org or one identity.
 * Explicit `produces[].consumers` lists become produces declarations.
 * Unreadable manifests are collected in `errors`.
 */
export function buildSeedGraph(seedPaths: readonly string[]): SeedGraph {
  const seeds: SeedRecord[] = []
  const errors: string[] = []

  for (const seedPath of seedPaths) {
    try {
      const seed = readSeed(seedPath)
      seeds.push({ path: seedPath, identity: seedIdentity(seed), seed })
    } catch (error) {
      if (!(error instanceof InvalidSeedError)) throw error
      errors.push(`${seedPath}: ${error.reason}`)
    }
  }

  // Index producers by artifact type
  const producersByType = new Map<string, string[]>()
  const declarations: Array<ProducesDeclaration | ConsumesDeclaration> = []

  for (const { identity, seed } of seeds) {
    for (const item of seed.produces) {
      const type = artifactType(item)
      const producers = producersByType.get(type) ?? []
      producers.push(identity)
      producersByType.set(type, producers)

      if (typeof item !== 'string') {
        for (const consumer of item.consumers ?? []) {
          declarations.push({ type: 'produces', producer: identity, consumer, artifact: type })
        }
      }
    }
  }

  for (const { identity, seed } of seeds) {
    for (const item of seed.consumes) {
      const type = artifactType(item)
      const source = typeof item === 'string' ? undefined : item.source

      for (const producer of producersByType.get(type) ?? []) {
        if (producer === identity) continue
        if (source) {
          // Match on org prefix or full identity
          const producerOrg = producer.split('/')[0]
          if (source !== producer && source !== producerOrg) continue
        }
        declarations.push({ type: 'consumes', consumer: identity, producer, artifact: type })
      }
    }
  }

  return {
    nodes: seeds.map(s => s.identity).sort(),
    seeds,
    declarations,
    errors
  }
}

/**
 * Discover and build in one step
 */
export async function loadSeedGraph(
  workspace: string,
  options: { pattern?: string } = {}
): Promise<SeedGraph> {
  return buildSeedGraph(await discoverSeeds(workspace, options))
}

export function formatSeedGraph(graph: SeedGraph): string {
  const lines = [`Seed Graph: ${graph.nodes.length} repos, ${graph.declarations.length} edges`]

  if (graph.declarations.length > 0) {
    lines.push('', 'Produces/Consumes edges:')
    for (const decl of graph.declarations) {
      lines.push(`  ${decl.producer} --[${decl.artifact ?? 'unknown'}]--> ${decl.consumer}`)
    }
  }

  if (graph.errors.length > 0) {
    lines.push('', `Errors: ${graph.errors.length}`)
    for (const error of graph.errors) {
      lines.push(`  ${error}`)
    }
  }

  return lines.join('\n')
}
