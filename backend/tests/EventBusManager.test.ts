import { describe, expect, it, vi } from 'vitest'
import { Receiver, type Logger } from '@gametime/core'
import { EventBusManager } from '../src/EventBusManager'

const createLogger = () => ({
	log: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn()
}) satisfies Logger

describe('EventBusManager', () => {
	it('delivers ss: events to local handlers', () => {
		const bus = new EventBusManager(createLogger())
		const handler = vi.fn()
		bus.on('ss:scheduler:triggered', handler)

		bus.emit(Receiver.All, 'ss:scheduler:triggered', { id: 'a' })

		expect(handler).toHaveBeenCalledWith({ id: 'a' }, expect.objectContaining({ id: 'server' }))
	})

	it('routes replies from a handler back through the bus', () => {
		const bus = new EventBusManager(createLogger())
		const reply = vi.fn()
		bus.on('ss:test:ping', (data, client) => client.emit(Receiver.Sender, 'ss:test:pong', data))
		bus.on('ss:test:pong', reply)

		bus.emit(Receiver.All, 'ss:test:ping', 7)

		expect(reply).toHaveBeenCalledWith(7, expect.anything())
	})

	it('keeps going when a handler throws', () => {
		const logger = createLogger()
		const bus = new EventBusManager(logger)
		const failure = new Error('boom')
		const after = vi.fn()
		bus.on('ss:test:event', () => {
			throw failure
		})
		bus.on('ss:test:event', after)

		bus.emit(Receiver.All, 'ss:test:event', null)

		expect(after).toHaveBeenCalledTimes(1)
		expect(logger.error).toHaveBeenCalledWith('Error handling event ss:test:event:', failure)
	})

	it('removes handlers and ignores unknown prefixes', () => {
		const logger = createLogger()
		const bus = new EventBusManager(logger)
		const handler = vi.fn()
		bus.on('ss:test:event', handler)
		bus.off('ss:test:event', handler)

		bus.emit(Receiver.All, 'ss:test:event', null)
		bus.emit(Receiver.All, 'sc:test:event', null)

		expect(handler).not.toHaveBeenCalled()
		expect(logger.warn).toHaveBeenCalledWith('Event sc:test:event has no recognized prefix (ss:)')
	})
})
