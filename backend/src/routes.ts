import express, { type ErrorRequestHandler } from 'express'
import { GameTimeError, type GameTimeManager, type Logger, type ScheduleEntry } from '@gametime/core'
import { parseScheduleOptions } from './parsers'

/**
 * The part of an express response the handlers write to.
 */
export interface ApiResponse {
	status(code: number): ApiResponse
	json(body: unknown): void
	end(): void
}

const toView = (entry: ScheduleEntry) => ({
	id: entry.id,
	handler: entry.handler,
	args: entry.args,
	at: entry.target,
	repeat: entry.repeat,
	status: entry.status,
	nextFireAtGame: entry.nextFireAtGame,
	lastFiredAtGame: entry.lastFiredAtGame
})

export function createApiHandlers(gameTime: GameTimeManager) {
	return {
		health(res: ApiResponse): void {
			res.json({ status: 'ok' })
		},

		time(res: ApiResponse): void {
			res.json({
				gameSeconds: gameTime.now(),
				speedFactor: gameTime.converter.speedFactor,
				units: gameTime.describeNow()
			})
		},

		listSchedules(res: ApiResponse): void {
			res.json(gameTime.scheduler.getEntries().map(toView))
		},

		createSchedule(body: unknown, res: ApiResponse): void {
			const handle = gameTime.scheduler.schedule(parseScheduleOptions(body, 'request body'))
			res.status(201).json(handle)
		},

		cancelSchedule(id: string, res: ApiResponse): void {
			if (!gameTime.scheduler.cancel(id)) {
				res.status(404).json({ error: `no schedule ${id}` })
				return
			}
			res.status(204).end()
		}
	}
}

export function createApiRouter(gameTime: GameTimeManager): express.Router {
	const router = express.Router()
	const handlers = createApiHandlers(gameTime)

	// Health check endpoint
	router.get('/health', (req, res) => handlers.health(res))
	router.get('/time', (req, res) => handlers.time(res))
	router.get('/schedules', (req, res) => handlers.listSchedules(res))
	router.post('/schedules', (req, res) => handlers.createSchedule(req.body, res))
	router.delete('/schedules/:id', (req, res) => handlers.cancelSchedule(req.params.id, res))

	return router
}

/**
 * Library errors are the caller's fault, anything else is ours.
 */
export function sendError(error: unknown, res: ApiResponse, logger: Logger, context: string): void {
	// express.json() rejects malformed bodies with a SyntaxError
	if (error instanceof GameTimeError || error instanceof SyntaxError) {
		res.status(400).json({ error: error.message, type: error.name })
		return
	}
	logger.error(`${context} failed:`, error)
	res.status(500).json({ error: 'internal error' })
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
	return (error, req, res, next) => {
		if (res.headersSent) {
			next(error)
			return
		}
		sendError(error, res, logger, `${req.method} ${req.path}`)
	}
}
