import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { GameTimeManager, LogLevel, LogsManager, RealTimeGameClock, type TimerHost } from '@gametime/core'
import { EventBusManager } from '../src/EventBusManager'
import { applyContentSchedules, readContentSchedules } from '../src/content'
import { DEFAULT_SCHEDULES_PATH } from '../src/config'
import { registerHandlers } from '../src/handlers'

const createGameTime = () => {
	const logs = new LogsManager(LogLevel.None)
	const timers: TimerHost = {
		armOnce: vi.fn(() => 1),
		disarm: vi.fn()
	}
	const clock = new RealTimeGameClock({ speedFactor: 1, offsetSeconds: 3600, now: () => 0 })
	const gameTime = new GameTimeManager(new EventBusManager(logs.getLogger('EventBusManager')), { speedFactor: 1 }, { clock, timers, logs })
	registerHandlers(gameTime.handlers, logs.getLogger('Handlers'))
	return { gameTime, timers, logger: logs.getLogger('Test') }
}

describe('content schedules', () => {
	let dir: string

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'game-time-content-'))
	})

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true })
	})

	it('loads the bundled schedules', async () => {
		const schedules = await readContentSchedules(DEFAULT_SCHEDULES_PATH)

		expect(schedules.map(schedule => schedule.id)).toEqual(['dawn-bell', 'market-opens', 'weekly-census', 'heartbeat'])
	})

	it('requires an id on every entry', async () => {
		const filePath = path.join(dir, 'schedules.json')
		await fs.writeFile(filePath, JSON.stringify([{ handler: 'announce', at: { hour: 1 } }]))

		await expect(readContentSchedules(filePath)).rejects.toThrow(`${filePath}[0] needs an id so it is not scheduled twice`)
	})

	it('only schedules entries that are not known yet', () => {
		const { gameTime, logger } = createGameTime()
		gameTime.scheduler.schedule({ id: 'dawn-bell', handler: 'announce', args: ['restored'], at: { hour: 6 } })

		const added = applyContentSchedules(gameTime.scheduler, [
			{ id: 'dawn-bell', handler: 'announce', at: { hour: 6, min: 0 } },
			{ id: 'dusk-bell', handler: 'announce', at: { hour: 18, min: 0 } }
		], logger)

		expect(added).toEqual(['dusk-bell'])
		expect(gameTime.scheduler.getEntry('dawn-bell')?.args).toEqual(['restored'])
	})

	it('skips entries that cannot be scheduled', () => {
		const { gameTime, logger } = createGameTime()

		const added = applyContentSchedules(gameTime.scheduler, [
			{ id: 'bad', handler: 'announce', at: { fortnight: 1 } },
			{ id: 'orphan', handler: 'missing', at: { hour: 2 } },
			{ id: 'good', handler: 'announce', at: { hour: 2 } }
		], logger)

		expect(added).toEqual(['good'])
	})
})
