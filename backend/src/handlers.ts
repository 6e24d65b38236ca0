import type { HandlerRegistry, Logger } from '@gametime/core'

export const HandlerIds = {
	Announce: 'announce',
	Heartbeat: 'heartbeat'
} as const

/**
 * Handlers schedules may refer to. They are registered before the scheduler
 * resumes so stored schedules find them.
 */
export function registerHandlers(handlers: HandlerRegistry, logger: Logger): void {
	handlers.register(HandlerIds.Announce, (message, ...rest) => {
		logger.info(String(message), ...rest)
	})

	handlers.register(HandlerIds.Heartbeat, () => {
		logger.debug('heartbeat')
	})
}
