/**
 * GovernanceEngine tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { GovernanceEngine } from '../src/engine.js'
import { parseConfig } from '../src/lib/config-loader.js'
import { RegistryStore } from '../src/lib/registry-store.js'
import type { CascadeEvent } from '../src/lib/dispatch.js'
import type { Logger } from '../src/lib/logger.js'
import { StaleSnapshotError } from '../src/lib/errors.js'
import type { ApprovedMutation, Entry, LifecycleState } from '../src/types.js'

function entry(id: string, state: LifecycleState, dependencies: string[] = [], organ = 'I'): Entry {
  return { id, organ, tier: 'standard', state, dependencies }
}

function makeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn()
  } satisfies Logger
}

const config = parseConfig({
  organs: ['I', 'II'],
  dispatch: { retries: 0, retry_delay_ms: 0 }
})

/**
 * Store that lets another writer slip in before the first apply
 */
class RacingStore extends RegistryStore {
  private raced = false

  override apply(mutation: ApprovedMutation): Entry {
    if (!this.raced) {
      this.raced = true
      this.create({ id: 'intruder', organ: 'I', tier: 'stub' })
    }
    return super.apply(mutation)
  }
}

describe('GovernanceEngine', () => {
  describe('requestTransition', () => {
    it('should apply an allowed transition and deliver its cascade', async () => {
      const delivered: CascadeEvent[] = []
      const store = new RegistryStore([entry('A', 'proposed'), entry('B', 'proposed', ['A'])])
      const engine = new GovernanceEngine({
        config,
        store,
        deliver: async event => { delivered.push(event) }
      })

      const result = await engine.requestTransition('A', 'active')

      expect(result.applied).toBe(true)
      if (!result.applied) return
      expect(result.entry.state).toBe('active')
      expect(result.cascade.plan.events).toEqual([{ entryId: 'B', event: 'reValidate' }])
      expect(result.cascade.dispatch.completed).toBe(true)
      expect(delivered.map(e => [e.entryId, e.kind, e.trigger])).toEqual([['B', 'reValidate', 'A']])
      expect(store.version).toBe(1)
    })

    it('should leave the registry untouched on denial', async () => {
      const store = new RegistryStore([entry('A', 'proposed'), entry('B', 'proposed', ['A'])])
      const engine = new GovernanceEngine({ config, store })

      const result = await engine.requestTransition('B', 'active')

      expect(result.applied).toBe(false)
      if (result.applied) return
      expect(result.entryId).toBe('B')
      expect(result.reason.code).toBe('UNMET_DEPENDENCY')
      expect(store.version).toBe(0)
    })

    it('should warn when forcing over active dependents', async () => {
      const logger = makeLogger()
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'active', ['A'])])
      const engine = new GovernanceEngine({ config, store, logger })

      const result = await engine.requestTransition('A', 'retired', { force: true })

      expect(result.applied).toBe(true)
      expect(logger.warn).toHaveBeenCalledWith('Forced A active -> retired over active dependents: B')
    })

    it('should recompute a stale approval against a fresh snapshot', async () => {
      const logger = makeLogger()
      const store = new RacingStore([entry('A', 'proposed')])
      const engine = new GovernanceEngine({ config, store, logger })

      const result = await engine.requestTransition('A', 'active')

      expect(result.applied).toBe(true)
      expect(store.version).toBe(2)
      expect(logger.warn).toHaveBeenCalledWith('Registry moved from v0 to v1 while approving A, retrying')
    })

    it('should give up after the configured stale retries', async () => {
      const store = new RacingStore([entry('A', 'proposed')])
      const engine = new GovernanceEngine({ config, store, staleRetries: 0 })

      await expect(engine.requestTransition('A', 'active')).rejects.toThrow(StaleSnapshotError)
    })

    it('should report an incomplete cascade without undoing the change', async () => {
      const logger = makeLogger()
      const store = new RegistryStore([entry('A', 'proposed'), entry('B', 'proposed', ['A'])])
      const engine = new GovernanceEngine({
        config,
        store,
        logger,
        deliver: async () => { throw new Error('unreachable endpoint') }
      })

      const result = await engine.requestTransition('A', 'active')

      expect(result.applied).toBe(true)
      if (!result.applied) return
      expect(store.find('A')?.state).toBe('active')
      expect(result.cascade.dispatch.failed).toBe(1)
      expect(logger.warn).toHaveBeenCalledWith(
        `Cascade ${result.cascade.plan.id} incomplete: 1 failed, 0 skipped`
      )
    })
  })

  describe('requestDependencyChange', () => {
    it('should apply an allowed change and cascade it', async () => {
      const store = new RegistryStore([entry('A', 'active'), entry('B', 'proposed'), entry('C', 'proposed', ['B'])])
      const engine = new GovernanceEngine({ config, store })

      const result = await engine.requestDependencyChange('B', ['A'])

      expect(result.applied).toBe(true)
      if (!result.applied) return
      expect(result.entry.dependencies).toEqual(['A'])
      expect(result.cascade.plan.changeKind).toBe('dependencies')
      expect(result.cascade.plan.events.map(e => e.entryId)).toEqual(['C'])
    })

    it('should deny a change that closes a cycle', async () => {
      const store = new RegistryStore([entry('A', 'proposed'), entry('B', 'proposed', ['A'])])
      const engine = new GovernanceEngine({ config, store })

      const result = await engine.requestDependencyChange('A', ['B'])

      expect(result.applied).toBe(false)
      if (!result.applied) {
        expect(result.reason.code).toBe('DEPENDENCY_CYCLE')
      }
    })
  })

  describe('queries', () => {
    const store = new RegistryStore([
      entry('A', 'active'),
      entry('B', 'active', ['A']),
      entry('X', 'proposed', [], 'III')
    ])
    const engine = new GovernanceEngine({ config, store })

    it('should audit the current snapshot with the configured organs', () => {
      const report = engine.audit({ now: () => new Date('2026-03-31T00:00:00Z') })

      expect(report.passed).toBe(true)
      expect(report.violations.map(v => v.kind)).toEqual(['UNKNOWN_ORGAN'])
      expect(report.timestamp).toBe('2026-03-31T00:00:00.000Z')
    })

    it('should check transitions without applying them', () => {
      const decision = engine.checkTransition('A', 'retired')
      expect(decision.approved).toBe(false)
      expect(store.version).toBe(0)
    })

    it('should compute impact and plans', () => {
      expect(engine.impact('A').affected).toEqual(['B'])
      expect(engine.planChange('A', 'metrics').events).toEqual([{ entryId: 'B', event: 'reComputeMetrics' }])
      expect(engine.graph().ok).toBe(true)
    })

    it('should plan nothing for an unchanged metrics signal', async () => {
      const result = await engine.notifyMetricsChanged('A', false)
      expect(result.plan.events).toEqual([])
      expect(result.dispatch.completed).toBe(true)
    })
  })

  describe('fromConfig', () => {
    let rootDir: string

    beforeEach(() => {
      rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regula-engine-test-'))
    })

    afterEach(() => {
      fs.rmSync(rootDir, { recursive: true, force: true })
    })

    function writeFile(relativePath: string, content: string): string {
      const file = path.join(rootDir, relativePath)
      fs.mkdirSync(path.dirname(file), { recursive: true })
      fs.writeFileSync(file, content)
      return file
    }

    it('should load the registry and seed workspace', async () => {
      new RegistryStore([
        entry('core-org/theory', 'active'),
        entry('media-org/blog', 'active', [], 'II')
      ], 3).save(path.join(rootDir, 'data', 'registry.json'))

      writeFile('ws/core-org/theory/seed.yaml', [
        'org: core-org',
        'repo: theory',
        'produces:',
        '  - type: essay',
        '    consumers: [media-org/blog]'
      ].join('\n'))
      writeFile('ws/media-org/blog/seed.yaml', [
        'org: media-org',
        'repo: blog',
        'subscriptions:',
        '  - event: theory.published',
        '    source: I',
        '    action: rebuild'
      ].join('\n'))

      const engine = await GovernanceEngine.fromConfig(parseConfig({
        organs: ['I', 'II'],
        registry: { path: 'data/registry.json' },
        seeds: { workspace: 'ws' }
      }), { rootDir })

      expect(engine.store.version).toBe(3)
      expect(engine.impact('core-org/theory').affected).toEqual(['media-org/blog'])
      expect(engine.route('theory.published', 'I')).toEqual([
        { repo: 'media-org/blog', action: 'rebuild', event: 'theory.published' }
      ])
    })

    it('should start empty without a registry and skip broken seeds', async () => {
      const logger = makeLogger()
      const broken = writeFile('ws/bad/seed/seed.yaml', '- not a mapping')

      const engine = await GovernanceEngine.fromConfig(parseConfig({
        seeds: { workspace: 'ws' }
      }), { rootDir, logger })

      expect(engine.store.size).toBe(0)
      expect(logger.warn).toHaveBeenCalledWith(
        `Registry not found at ${path.join(rootDir, 'registry.json')}, starting empty`
      )
      expect(logger.warn).toHaveBeenCalledWith(`Skipping seed ${broken}: not a YAML mapping`)
    })
  })
})
