import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { openDatabase, type DatabaseContext } from '../db'
import { buildCompletedTask, buildTask } from '../db/testing/taskFixtures'
import { FakeRemoteTaskClient } from '../remote/testing/FakeRemoteTaskClient'
import { getBootHistory, getTaskEngine, initTaskEngine, shutdownTaskEngine } from './index'

describe('initTaskEngine', () => {
  let dataRoot: string
  let context: DatabaseContext

  beforeEach(() => {
    dataRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-init-'))
    context = openDatabase({ dbPath: ':memory:', dataRoot })
  })

  afterEach(() => {
    shutdownTaskEngine()
    context.db.close()
    fs.rmSync(dataRoot, { recursive: true, force: true })
  })

  it('boots one engine, recovers tasks and loads history', () => {
    context.taskDao.upsert(buildTask({ id: 'draft-1', status: 'created', createdAt: '2026-01-02T00:00:00.000Z' }))
    context.taskDao.upsert(buildCompletedTask({ id: 'remote-1' }))

    const engine = initTaskEngine(context, { remote: new FakeRemoteTaskClient() })

    expect(initTaskEngine(context)).toBe(engine)
    expect(getTaskEngine()).toBe(engine)
    const history = getBootHistory()
    expect(history.list().map((task) => task.id)).toEqual(['draft-1', 'remote-1'])
    expect(history.get('draft-1')?.status).toBe('failed')
  })

  it('throws before initialisation and after shutdown', () => {
    expect(() => getTaskEngine()).toThrow('TaskEngine is not initialized. Call initTaskEngine() first.')

    initTaskEngine(context, { remote: new FakeRemoteTaskClient() })
    shutdownTaskEngine()

    expect(() => getBootHistory()).toThrow('TaskEngine is not initialized. Call initTaskEngine() first.')
  })
})
