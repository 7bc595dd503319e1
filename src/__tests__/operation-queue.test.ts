import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, statSync } from 'node:fs'
import { join } from 'node:path'

import { OperationQueue, queuePath } from '../core/operation-queue.js'
import { createTempDir, silentLogger } from './helpers.js'

function op(name: string) {
  return { operationType: 'execute', payload: { taskId: name } }
}

describe('OperationQueue', () => {
  let tmpDir: string
  let queueDir: string
  let queue: OperationQueue

  beforeEach(() => {
    tmpDir = createTempDir()
    queueDir = join(tmpDir, 'queues')
    queue = new OperationQueue(queueDir, 'billing', silentLogger)
  })

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true })
  })

  it('stores one file per integration', () => {
    expect(queue.path).toBe(join(queueDir, 'billing.jsonl'))
    expect(queuePath(queueDir, 'mail')).toBe(join(queueDir, 'mail.jsonl'))
  })

  it('dequeues in the order operations were enqueued', () => {
    expect(queue.enqueue(op('A'))).toBe(true)
    expect(queue.enqueue(op('B'))).toBe(true)
    expect(queue.enqueue(op('C'))).toBe(true)

    expect(queue.dequeue()?.payload.taskId).toBe('A')
    expect(queue.dequeue()?.payload.taskId).toBe('B')
    expect(queue.dequeue()?.payload.taskId).toBe('C')
    expect(queue.dequeue()).toBeNull()
  })

  it('returns null when dequeuing an empty queue', () => {
    expect(queue.dequeue()).toBeNull()
  })

  it('stamps queuedAt and writes one JSON line per operation', () => {
    queue.enqueue(op('A'))

    const lines = readFileSync(queue.path, 'utf-8').split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[1]).toBe('')
    const entry = JSON.parse(lines[0]) as { operationType: string; payload: unknown; queuedAt: string }
    expect(entry.operationType).toBe('execute')
    expect(entry.payload).toEqual({ taskId: 'A' })
    expect(Number.isNaN(Date.parse(entry.queuedAt))).toBe(false)
  })

  it('creates the queue file readable by the owner only', () => {
    queue.enqueue(op('A'))
    expect(statSync(queue.path).mode & 0o777).toBe(0o600)
  })

  it('survives a new instance over the same file', () => {
    queue.enqueue(op('A'))
    queue.enqueue(op('B'))

    const reopened = new OperationQueue(queueDir, 'billing', silentLogger)
    expect(reopened.size()).toBe(2)
    expect(reopened.dequeue()?.payload.taskId).toBe('A')
    expect(queue.peek()?.payload.taskId).toBe('B')
  })

  it('peeks without removing', () => {
    queue.enqueue(op('A'))
    expect(queue.peek()?.payload.taskId).toBe('A')
    expect(queue.size()).toBe(1)
  })

  it('skips malformed lines', () => {
    mkdirSync(queueDir, { recursive: true })
    appendFileSync(queue.path, 'not json\n{"operationType":"execute"}\n')
    queue.enqueue(op('A'))

    expect(queue.size()).toBe(1)
    expect(queue.dequeue()?.payload.taskId).toBe('A')
  })

  it('lists entries in order without removing them', () => {
    expect(queue.entries()).toEqual([])
    queue.enqueue(op('A'))
    queue.enqueue(op('B'))

    expect(queue.entries()?.map((entry) => entry.payload.taskId)).toEqual(['A', 'B'])
    expect(queue.size()).toBe(2)
  })

  it('clears the backlog', () => {
    queue.enqueue(op('A'))
    expect(queue.clear()).toBe(true)
    expect(existsSync(queue.path)).toBe(false)
    expect(queue.size()).toBe(0)
  })

  it('reports false instead of throwing when the queue cannot be written', () => {
    const blocked = join(tmpDir, 'file-not-dir')
    appendFileSync(blocked, 'x')
    const broken = new OperationQueue(blocked, 'billing', silentLogger)

    expect(broken.enqueue(op('A'))).toBe(false)
    expect(broken.dequeue()).toBeNull()
  })

  it('rejects integration names that are not slugs', () => {
    expect(() => new OperationQueue(queueDir, '../escape', silentLogger)).toThrow(
      'Invalid integration name "../escape". Must be a lowercase slug (a-z, 0-9, hyphens).',
    )
  })
})
