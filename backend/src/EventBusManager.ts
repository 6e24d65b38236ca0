import { Receiver, type EventCallback, type EventClient, type EventManager, type Logger } from '@gametime/core'

/**
 * In-process event bus. `ss:` events are delivered to local handlers,
 * anything else is only logged since this host has no remote clients.
 */
export class EventBusManager implements EventManager {
	private eventHandlers: Map<string, EventCallback[]> = new Map()

	constructor(private logger: Logger) {
		this.logger.debug('Initialized')
	}

	on<T>(event: string, callback: EventCallback<T>): void {
		const handlers = this.eventHandlers.get(event) || []
		handlers.push(callback as EventCallback)
		this.eventHandlers.set(event, handlers)
		this.logger.debug(`Registered handler for ${event}. Total handlers: ${handlers.length}`)
	}

	off<T>(event: string, callback: EventCallback<T>): void {
		const handlers = this.eventHandlers.get(event)
		if (!handlers) {
			return
		}
		this.eventHandlers.set(event, handlers.filter(handler => handler !== callback))
	}

	emit(to: Receiver, event: string, data: unknown): void {
		if (!event.startsWith('ss:')) {
			this.logger.warn(`Event ${event} has no recognized prefix (ss:)`)
			return
		}

		const handlers = this.eventHandlers.get(event) || []
		this.logger.debug(`Emitting ${event} to ${to}, ${handlers.length} handler(s)`)

		handlers.forEach(handler => {
			try {
				handler(data, this.serverClient)
			} catch (error) {
				this.logger.error(`Error handling event ${event}:`, error)
			}
		})
	}

	private serverClient: EventClient = {
		id: 'server',
		emit: (to, event, data) => this.emit(to, event, data)
	}
}

