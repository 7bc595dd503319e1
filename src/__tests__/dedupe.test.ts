/// <reference types="vitest/globals" />

import { readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { DedupeTracker } from '../core/dedupe.js'
import { createTempDir, silentLogger } from './helpers.js'

describe('DedupeTracker', () => {
  let tmpDir: string
  let stateFile: string

  beforeEach(() => {
    tmpDir = createTempDir()
    stateFile = join(tmpDir, 'dedupe', 'inbox.json')
  })

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true })
  })

  it('starts empty without a state file', () => {
    const tracker = new DedupeTracker(stateFile, silentLogger)
    expect(tracker.count()).toBe(0)
    expect(tracker.isProcessed('ref-1')).toBe(false)
  })

  it('persists processed references across instances', () => {
    const tracker = new DedupeTracker(stateFile, silentLogger)
    tracker.markProcessed('ref-b')
    tracker.markProcessed('ref-a')
    tracker.markProcessed('ref-a')

    const reloaded = new DedupeTracker(stateFile, silentLogger)
    expect(reloaded.isProcessed('ref-a')).toBe(true)
    expect(reloaded.count()).toBe(2)
    expect(JSON.parse(readFileSync(stateFile, 'utf-8'))).toEqual({ processed: ['ref-a', 'ref-b'] })
  })

  it('clears every reference', () => {
    const tracker = new DedupeTracker(stateFile, silentLogger)
    tracker.markProcessed('ref-a')
    tracker.clear()

    expect(new DedupeTracker(stateFile, silentLogger).count()).toBe(0)
  })

  it('starts empty when the state file is corrupted', () => {
    writeFileSync(join(tmpDir, 'broken.json'), '{ nope')
    expect(new DedupeTracker(join(tmpDir, 'broken.json'), silentLogger).count()).toBe(0)
  })

  it('starts empty when the state file has the wrong shape', () => {
    writeFileSync(join(tmpDir, 'odd.json'), JSON.stringify({ processed: [1, 2] }))
    expect(new DedupeTracker(join(tmpDir, 'odd.json'), silentLogger).count()).toBe(0)
  })
})
