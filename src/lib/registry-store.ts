/**
 * Regula Registry Store
 *
 * In-memory, versioned entry list. Readers work on frozen snapshots; writes
 * go through `apply`, which accepts an approved mutation only if it was
 * computed against the current version.
 *
 * File format:
 * {
 *   "version": 3,
 *   "entries": [{ "id": "core/lib", "organ": "I", "tier": "standard", ... }]
 * }
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type {
  ApprovedMutation,
  Entry,
  LifecycleState,
  RegistrySnapshot,
  Tier
} from '../types.js'
import { INITIAL_STATE } from '../domain/lifecycle.js'
import { isValidIdentifier } from '../domain/edges.js'
import { RegistryFileSchema, formatIssues, type RegistryFile } from './schemas.js'
import {
  DuplicateEntryError,
  EntryNotFoundError,
  InvalidInitialStateError,
  InvalidRegistryError,
  StaleSnapshotError
} from './errors.js'

// =============================================================================
// Types
// =============================================================================

export interface EntryFilter {
  organ?: string
  tier?: Tier
  state?: LifecycleState
}

export interface NewEntry {
  id: string
  organ: string
  tier: Tier
  /** Must be `proposed` when given */
  state?: LifecycleState
  dependencies?: string[]
  description?: string
}

function copyEntry(entry: Entry): Entry {
  return { ...entry, dependencies: [...entry.dependencies] }
}

function freezeEntry(entry: Entry): Readonly<Entry> {
  const frozen = copyEntry(entry)
  Object.freeze(frozen.dependencies)
  return Object.freeze(frozen)
}

// =============================================================================
// Store
// =============================================================================

export class RegistryStore {
  private readonly entries = new Map<string, Entry>()
  private currentVersion: number

  constructor(entries: readonly Entry[] = [], version: number = 0) {
    for (const entry of entries) {
      if (this.entries.has(entry.id)) {
        throw new DuplicateEntryError(entry.id)
      }
      this.entries.set(entry.id, copyEntry(entry))
    }
    this.currentVersion = version
  }

  get version(): number {
    return this.currentVersion
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Point-in-time, deeply frozen view of the registry
   */
  snapshot(): RegistrySnapshot {
    const snapshot: RegistrySnapshot = {
      version: this.currentVersion,
      takenAt: new Date().toISOString(),
      entries: Object.freeze([...this.entries.values()].map(freezeEntry))
    }
    return Object.freeze(snapshot)
  }

  list(filter: EntryFilter = {}): Entry[] {
    return [...this.entries.values()]
      .filter(e =>
        (filter.organ === undefined || e.organ === filter.organ) &&
        (filter.tier === undefined || e.tier === filter.tier) &&
        (filter.state === undefined || e.state === filter.state)
      )
      .map(copyEntry)
  }

  find(id: string): Entry | undefined {
    const entry = this.entries.get(id)
    return entry ? copyEntry(entry) : undefined
  }

  /**
   * Register a new entry. New entries always start as `proposed`.
   */
  create(input: NewEntry): Entry {
    if (!isValidIdentifier(input.id)) {
      throw new InvalidRegistryError(`invalid entry id "${input.id}"`)
    }
    if (this.entries.has(input.id)) {
      throw new DuplicateEntryError(input.id)
    }
    const state = input.state ?? INITIAL_STATE
    if (state !== INITIAL_STATE) {
      throw new InvalidInitialStateError(input.id, state)
    }

    const entry: Entry = {
      id: input.id,
      organ: input.organ,
      tier: input.tier,
      state,
      dependencies: [...new Set(input.dependencies ?? [])],
      description: input.description
    }
    this.entries.set(entry.id, entry)
    this.currentVersion++
    return copyEntry(entry)
  }

  /**
   * Apply an approved mutation under optimistic concurrency.
   *
   * @throws StaleSnapshotError when the registry moved past the approval's snapshot
   * @throws EntryNotFoundError when the entry no longer exists
   */
  apply(mutation: ApprovedMutation): Entry {
    if (mutation.snapshotVersion !== this.currentVersion) {
      throw new StaleSnapshotError(mutation.entryId, mutation.snapshotVersion, this.currentVersion)
    }

    const entry = this.entries.get(mutation.entryId)
    if (!entry) {
      throw new EntryNotFoundError(mutation.entryId)
    }

    const updated: Entry = mutation.type === 'transition'
      ? { ...entry, state: mutation.to }
      : { ...entry, dependencies: [...mutation.to] }

    this.entries.set(updated.id, updated)
    this.currentVersion++
    return copyEntry(updated)
  }

  toJSON(): RegistryFile {
    return {
      version: this.currentVersion,
      entries: [...this.entries.values()].map(copyEntry)
    }
  }

  save(filePath: string): void {
    const dir = dirname(filePath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    writeFileSync(filePath, JSON.stringify(this.toJSON(), null, 2) + '\n')
  }

  /**
   * Load a registry JSON file
   *
   * @throws InvalidRegistryError when the file is missing, unparsable or invalid
   */
  static load(filePath: string): RegistryStore {
    if (!existsSync(filePath)) {
      throw new InvalidRegistryError('file not found', filePath)
    }

    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'))
    } catch (error) {
      const cause = error instanceof Error ? error : undefined
      throw new InvalidRegistryError(cause?.message ?? 'JSON parse error', filePath, cause)
    }

    const result = RegistryFileSchema.safeParse(raw)
    if (!result.success) {
      throw new InvalidRegistryError(formatIssues(result.error), filePath)
    }

    return new RegistryStore(result.data.entries, result.data.version)
  }
}
