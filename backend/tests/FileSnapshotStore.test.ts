import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { ScheduleState } from '@gametime/core'
import { FileSnapshotStore } from '../src/FileSnapshotStore'
import { parseScheduleState } from '../src/parsers'

const createState = (id: string): ScheduleState => ({
	id,
	handler: 'announce',
	args: ['Noon'],
	target: { hour: 12, min: 0 },
	repeat: true,
	needsRecompute: true,
	createdAtGame: 100
})

describe('FileSnapshotStore', () => {
	let dir: string
	let filePath: string

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'game-time-store-'))
		filePath = path.join(dir, 'nested', 'schedules.json')
	})

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true })
	})

	it('starts empty when the file does not exist', async () => {
		const store = new FileSnapshotStore(filePath, parseScheduleState)

		expect(await store.list()).toEqual([])
		expect(await store.load('noon')).toBeNull()
	})

	it('keeps concurrent saves and survives a new instance', async () => {
		const store = new FileSnapshotStore(filePath, parseScheduleState)

		await Promise.all([store.save('a', createState('a')), store.save('b', createState('b'))])

		const reopened = new FileSnapshotStore(filePath, parseScheduleState)
		expect((await reopened.list()).sort()).toEqual(['a', 'b'])
		expect(await reopened.load('b')).toEqual(createState('b'))
	})

	it('deletes records', async () => {
		const store = new FileSnapshotStore(filePath, parseScheduleState)
		await store.save('a', createState('a'))

		await store.delete('a')

		expect(await store.list()).toEqual([])
		expect(JSON.parse(await fs.readFile(filePath, 'utf8'))).toEqual({})
	})

	it('validates records on load', async () => {
		await fs.mkdir(path.dirname(filePath), { recursive: true })
		await fs.writeFile(filePath, JSON.stringify({ broken: { id: 'broken', handler: 'announce' } }))
		const store = new FileSnapshotStore(filePath, parseScheduleState)

		await expect(store.load('broken')).rejects.toThrow('stored schedule broken: repeat and needsRecompute must be booleans')
	})
})
