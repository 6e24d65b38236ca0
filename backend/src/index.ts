import express from 'express'
import { createServer } from 'http'
import path from 'path'
import cors from 'cors'
import dotenv from 'dotenv'
import {
	GameTimeManager,
	LogsManager,
	RealTimeGameClock,
	SchedulerEvents,
	type GameClockSnapshot,
	type ScheduleState,
	type TriggeredEventData
} from '@gametime/core'
import { EventBusManager } from './EventBusManager'
import { FileSnapshotStore } from './FileSnapshotStore'
import { loadServerConfig } from './config'
import { parseClockSnapshot, parseScheduleState } from './parsers'
import { registerHandlers } from './handlers'
import { readContentSchedules } from './content'
import { restoreClock, startGameTime, suspendGameTime } from './lifecycle'
import { createApiRouter, createErrorHandler } from './routes'

dotenv.config()

const config = loadServerConfig()
const logs = new LogsManager(config.gameTime.logLevel)
const logger = logs.getLogger('Backend')

process.on('uncaughtException', (err) => {
	logger.error('Uncaught Exception:', err)
})

process.on('unhandledRejection', (reason) => {
	logger.error('Unhandled Rejection:', reason)
})

async function main() {
	const clockStore = new FileSnapshotStore<GameClockSnapshot>(path.join(config.dataDir, 'clock.json'), parseClockSnapshot)
	const scheduleStore = new FileSnapshotStore<ScheduleState>(path.join(config.dataDir, 'schedules.json'), parseScheduleState)

	const clock = new RealTimeGameClock({ speedFactor: config.gameTime.speedFactor })
	await restoreClock(clock, clockStore)

	const eventBus = new EventBusManager(logs.getLogger('EventBusManager'))
	const gameTime = new GameTimeManager(eventBus, config.gameTime, { clock, store: scheduleStore, logs })
	registerHandlers(gameTime.handlers, logs.getLogger('Handlers'))

	eventBus.on<TriggeredEventData>(SchedulerEvents.SS.Triggered, (data) => {
		logger.debug(`Schedule ${data.id} fired at game time ${data.firedAtGame}`)
	})

	const { restored, added } = await startGameTime(gameTime, await readContentSchedules(config.schedulesPath), logger)
	logger.info(`Game time ${gameTime.now()}s at ${config.gameTime.speedFactor}x, ${restored} schedule(s) restored, ${added.length} added from content`)

	const app = express()
	app.use(cors({ origin: [config.clientUrl], methods: ['GET', 'POST', 'DELETE'] }))
	app.use(express.json())
	app.use('/api', createApiRouter(gameTime))
	app.use(createErrorHandler(logger))

	const httpServer = createServer(app)
	httpServer.listen(config.port, () => {
		logger.info(`Server running on port ${config.port}`)
	})

	let stopping = false
	const shutdown = async (signal: string) => {
		if (stopping) return
		stopping = true
		logger.info(`${signal} received, suspending schedules`)

		await suspendGameTime(gameTime, clock, clockStore)

		httpServer.close(() => {
			logger.info('Server closed')
			process.exit(0)
		})
	}

	for (const signal of ['SIGINT', 'SIGTERM'] as const) {
		process.on(signal, () => {
			shutdown(signal).catch((error: unknown) => {
				logger.error('Shutdown failed:', error)
				process.exit(1)
			})
		})
	}
}

main().catch((error: unknown) => {
	logger.error('Startup failed:', error)
	process.exit(1)
})
