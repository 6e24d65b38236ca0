import { GameTimeError, type GameClockSnapshot, type HandlerArg, type PartialTimeSpec, type ScheduleOptions, type ScheduleState } from '@gametime/core'
import { isRecord } from './FileSnapshotStore'

const isHandlerArg = (value: unknown): value is HandlerArg => {
	return value === null || ['string', 'number', 'boolean'].includes(typeof value)
}

const parseArgs = (value: unknown, where: string): HandlerArg[] => {
	if (value === undefined) {
		return []
	}
	if (!Array.isArray(value) || !value.every(isHandlerArg)) {
		throw new GameTimeError(`${where}: args must be an array of strings, numbers, booleans or null`)
	}
	return value
}

const parseTarget = (value: unknown, where: string): PartialTimeSpec => {
	if (!isRecord(value)) {
		throw new GameTimeError(`${where}: target must be an object of unit names to values`)
	}
	const target: PartialTimeSpec = {}
	for (const [unit, amount] of Object.entries(value)) {
		if (typeof amount !== 'number') {
			throw new GameTimeError(`${where}: target ${unit} must be a number`)
		}
		if (!Number.isInteger(amount) || amount < 0) {
			throw new GameTimeError(`${where}: target ${unit} must be a non-negative integer, got ${amount}`)
		}
		target[unit] = amount
	}
	return target
}

const parseString = (value: unknown, name: string, where: string): string => {
	if (typeof value !== 'string' || value === '') {
		throw new GameTimeError(`${where}: ${name} must be a non-empty string`)
	}
	return value
}

/**
 * Reads schedule options from a request body or a content file.
 */
export function parseScheduleOptions(value: unknown, where: string = 'schedule'): ScheduleOptions {
	if (!isRecord(value)) {
		throw new GameTimeError(`${where}: expected an object`)
	}
	if (value.repeat !== undefined && typeof value.repeat !== 'boolean') {
		throw new GameTimeError(`${where}: repeat must be a boolean`)
	}

	return {
		id: value.id === undefined ? undefined : parseString(value.id, 'id', where),
		handler: parseString(value.handler, 'handler', where),
		args: parseArgs(value.args, where),
		at: parseTarget(value.at, where),
		repeat: value.repeat
	}
}

export function parseScheduleState(value: unknown): ScheduleState {
	if (!isRecord(value)) {
		throw new GameTimeError('stored schedule: expected an object')
	}
	const id = parseString(value.id, 'id', 'stored schedule')
	const where = `stored schedule ${id}`
	if (typeof value.repeat !== 'boolean' || typeof value.needsRecompute !== 'boolean') {
		throw new GameTimeError(`${where}: repeat and needsRecompute must be booleans`)
	}
	if (typeof value.createdAtGame !== 'number') {
		throw new GameTimeError(`${where}: createdAtGame must be a number`)
	}

	return {
		id,
		handler: parseString(value.handler, 'handler', where),
		args: parseArgs(value.args, where),
		target: parseTarget(value.target, where),
		repeat: value.repeat,
		needsRecompute: value.needsRecompute,
		createdAtGame: value.createdAtGame
	}
}

export function parseClockSnapshot(value: unknown): GameClockSnapshot {
	if (!isRecord(value) || typeof value.gameSeconds !== 'number' || typeof value.isPaused !== 'boolean') {
		throw new GameTimeError('stored clock: expected { gameSeconds: number, isPaused: boolean }')
	}
	return { gameSeconds: value.gameSeconds, isPaused: value.isPaused }
}
