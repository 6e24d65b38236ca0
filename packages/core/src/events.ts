import { Receiver } from './Receiver'

// Interface for whoever raised an event
export interface EventClient {
	id: string
	emit(to: Receiver, event: string, data: unknown): void
}

// Type for event callback functions
export type EventCallback<T = unknown> = (data: T, client: EventClient) => void

// Interface the host event bus implements
export interface EventManager {
	on<T>(event: string, callback: EventCallback<T>): void
	off<T>(event: string, callback: EventCallback<T>): void
	emit(to: Receiver, event: string, data: unknown): void
}
