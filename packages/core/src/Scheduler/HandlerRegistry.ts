import { UnknownHandlerError } from '../errors'
import type { HandlerArg, ScheduleHandler } from './types'

/**
 * Handlers are registered under a stable id before anything is scheduled.
 * Schedules only refer to that id, which is what lets them be persisted.
 */
export class HandlerRegistry {
	private handlers: Map<string, ScheduleHandler> = new Map()

	public register(id: string, handler: ScheduleHandler): void {
		if (this.handlers.has(id)) {
			throw new Error(`schedule handler ${id} is already registered`)
		}
		this.handlers.set(id, handler)
	}

	public unregister(id: string): boolean {
		return this.handlers.delete(id)
	}

	public has(id: string): boolean {
		return this.handlers.has(id)
	}

	public list(): string[] {
		return Array.from(this.handlers.keys())
	}

	public invoke(id: string, args: HandlerArg[]): void {
		const handler = this.handlers.get(id)
		if (!handler) {
			throw new UnknownHandlerError(id)
		}
		handler(...args)
	}
}
