/**
 * Tests for registry-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { RegistryStore } from '../../src/lib/registry-store.js'
import { approveDependencyChange, approveTransition } from '../../src/domain/approval.js'
import {
  DuplicateEntryError,
  EntryNotFoundError,
  InvalidInitialStateError,
  InvalidRegistryError,
  StaleSnapshotError
} from '../../src/lib/errors.js'
import type { Entry, LifecycleState, TransitionMutation } from '../../src/types.js'

function entry(id: string, state: LifecycleState, dependencies: string[] = [], organ = 'I'): Entry {
  return { id, organ, tier: 'standard', state, dependencies }
}

describe('RegistryStore', () => {
  it('should reject duplicate ids on construction', () => {
    expect(() => new RegistryStore([entry('A', 'active'), entry('A', 'proposed')]))
      .toThrow(DuplicateEntryError)
  })

  describe('snapshot', () => {
    it('should be deeply frozen and carry the version', () => {
      const store = new RegistryStore([entry('A', 'active', ['B']), entry('B', 'active')], 4)
      const snapshot = store.snapshot()

      expect(snapshot.version).toBe(4)
      expect(Object.isFrozen(snapshot)).toBe(true)
      expect(Object.isFrozen(snapshot.entries)).toBe(true)
      expect(Object.isFrozen(snapshot.entries[0])).toBe(true)
      expect(Object.isFrozen(snapshot.entries[0].dependencies)).toBe(true)
    })

    it('should not change when the store moves on', () => {
      const store = new RegistryStore([entry('A', 'proposed')])
      const before = store.snapshot()

      const approval = approveTransition(before, 'A', 'active')
      if (!approval.approved) throw new Error('expected approval')
      store.apply(approval.mutation)

      expect(before.entries[0].state).toBe('proposed')
      expect(store.snapshot().entries[0].state).toBe('active')
    })

    it('should not share state with the entries passed in', () => {
      const input = entry('A', 'active', ['B'])
      const store = new RegistryStore([input])
      input.dependencies.push('C')

      expect(store.find('A')?.dependencies).toEqual(['B'])
    })
  })

  describe('queries', () => {
    const store = new RegistryStore([
      entry('a', 'active', [], 'I'),
      entry('b', 'proposed', [], 'I'),
      entry('c', 'active', [], 'II')
    ])

    it('should filter by organ and state', () => {
      expect(store.list({ organ: 'I' }).map(e => e.id)).toEqual(['a', 'b'])
      expect(store.list({ state: 'active' }).map(e => e.id)).toEqual(['a', 'c'])
      expect(store.list({ organ: 'II', state: 'proposed' })).toEqual([])
      expect(store.size).toBe(3)
    })

    it('should return copies', () => {
      const found = store.find('a')
      expect(found).toEqual(entry('a', 'active', [], 'I'))
      found?.dependencies.push('x')
      expect(store.find('a')?.dependencies).toEqual([])
      expect(store.find('missing')).toBeUndefined()
    })
  })

  describe('create', () => {
    it('should register proposed entries and bump the version', () => {
      const store = new RegistryStore()
      const created = store.create({ id: 'core/lib', organ: 'I', tier: 'flagship', dependencies: ['x', 'x'] })

      expect(created).toEqual({
        id: 'core/lib',
        organ: 'I',
        tier: 'flagship',
        state: 'proposed',
        dependencies: ['x'],
        description: undefined
      })
      expect(store.version).toBe(1)
    })

    it('should reject other initial states', () => {
      const store = new RegistryStore()
      expect(() => store.create({ id: 'A', organ: 'I', tier: 'stub', state: 'active' }))
        .toThrow(InvalidInitialStateError)
      expect(store.version).toBe(0)
    })

    it('should reject invalid and duplicate ids', () => {
      const store = new RegistryStore([entry('A', 'active')])
      expect(() => store.create({ id: '', organ: 'I', tier: 'stub' }))
        .toThrow('Invalid registry: invalid entry id ""')
      expect(() => store.create({ id: 'A', organ: 'I', tier: 'stub' }))
        .toThrow(DuplicateEntryError)
    })
  })

  describe('apply', () => {
    it('should apply an approved transition', () => {
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'proposed', ['A'])])
      const approval = approveTransition(store.snapshot(), 'B', 'active')
      if (!approval.approved) throw new Error('expected approval')

      const updated = store.apply(approval.mutation)
      expect(updated.state).toBe('active')
      expect(store.version).toBe(1)
    })

    it('should apply an approved dependency change', () => {
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'proposed')])
      const approval = approveDependencyChange(store.snapshot(), 'B', ['A'])
      if (!approval.approved) throw new Error('expected approval')

      expect(store.apply(approval.mutation).dependencies).toEqual(['A'])
    })

    it('should reject a mutation computed against an older snapshot', () => {
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'active')])
      const snapshot = store.snapshot()
      const first = approveTransition(snapshot, 'A', 'deprecated')
      const second = approveTransition(snapshot, 'B', 'deprecated')
      if (!first.approved || !second.approved) throw new Error('expected approvals')

      store.apply(first.mutation)
      expect(() => store.apply(second.mutation)).toThrow(StaleSnapshotError)
      expect(store.find('B')?.state).toBe('active')
      expect(store.version).toBe(1)
    })

    it('should reject mutations for entries that no longer exist', () => {
      const store = new RegistryStore()
      const mutation: TransitionMutation = {
        type: 'transition',
        entryId: 'ghost',
        from: 'proposed',
        to: 'active',
        snapshotVersion: 0,
        forced: false,
        overriddenDependents: []
      }
      expect(() => store.apply(mutation)).toThrow(EntryNotFoundError)
    })
  })

  describe('persistence', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regula-registry-test-'))
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should save and load the registry with its version', () => {
      const file = path.join(tempDir, 'data', 'registry.json')
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'proposed', ['A'])], 9)
      store.save(file)

      expect(fs.readFileSync(file, 'utf-8').endsWith('}\n')).toBe(true)

      const loaded = RegistryStore.load(file)
      expect(loaded.version).toBe(9)
      expect(loaded.list()).toEqual([entry('A', 'active'), entry('B', 'proposed', ['A'])])
    })

    it('should default missing dependency lists', () => {
      const file = path.join(tempDir, 'registry.json')
      fs.writeFileSync(file, JSON.stringify({
        version: 1,
        entries: [{ id: 'A', organ: 'I', tier: 'stub', state: 'proposed' }]
      }))

      expect(RegistryStore.load(file).find('A')?.dependencies).toEqual([])
    })

    it('should reject a missing file', () => {
      const file = path.join(tempDir, 'missing.json')
      expect(() => RegistryStore.load(file)).toThrow(`Invalid registry in ${file}: file not found`)
    })

    it('should reject unparsable JSON', () => {
      const file = path.join(tempDir, 'registry.json')
      fs.writeFileSync(file, '{ not json')
      expect(() => RegistryStore.load(file)).toThrow(InvalidRegistryError)
    })

    it('should reject entries that fail validation', () => {
      const file = path.join(tempDir, 'registry.json')
      fs.writeFileSync(file, JSON.stringify({
        version: 1,
        entries: [{ id: '', organ: 'I', tier: 'standard', state: 'active' }]
      }))

      expect(() => RegistryStore.load(file)).toThrow(
        `Invalid registry in ${file}: entries.0.id: Must be a non-empty identifier (letters, digits, ".", "_", "-", "/")`
      )
    })
  })
})
