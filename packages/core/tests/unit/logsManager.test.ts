import { afterEach, describe, expect, it, vi } from 'vitest'
import { LogLevel, LogsManager, parseLogLevel } from '../../src/Logs'

describe('LogsManager', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('prefixes messages with the component name', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = new LogsManager().getLogger('ScheduleManager')

		logger.info('armed', 3)

		expect(log).toHaveBeenCalledWith('[ScheduleManager]', 'armed', 3)
	})

	it('filters by level and lets a component pin its own level', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logs = new LogsManager(LogLevel.Info)
		const quiet = logs.getLogger('Quiet')
		const chatty = logs.getLogger('Chatty')

		logs.setComponentLevel('Chatty', LogLevel.Debug)
		logs.setGlobalLevel(LogLevel.Warn)
		quiet.debug('hidden')
		quiet.info('hidden')
		chatty.debug('shown')

		expect(debug).toHaveBeenCalledTimes(1)
		expect(debug).toHaveBeenCalledWith('[Chatty]', 'shown')
		expect(log).not.toHaveBeenCalled()
		expect(logs.getComponentConfig('Quiet')).toEqual({ enabled: true, level: LogLevel.Warn })
	})

	it('can be switched off globally or per component', () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logs = new LogsManager()
		const first = logs.getLogger('First')
		const second = logs.getLogger('Second')

		logs.setComponentEnabled('First', false)
		first.error('muted')
		second.error('loud')
		logs.setGlobalEnabled(false)
		second.error('muted')

		expect(error).toHaveBeenCalledTimes(1)
		expect(error).toHaveBeenCalledWith('[Second]', 'loud')
	})

	it('returns the same logger for the same component', () => {
		const logs = new LogsManager()

		expect(logs.getLogger('A')).toBe(logs.getLogger('A'))
	})

	it('parses level names', () => {
		expect(parseLogLevel('WARN')).toBe(LogLevel.Warn)
		expect(parseLogLevel(' debug ')).toBe(LogLevel.Debug)
		expect(parseLogLevel('verbose')).toBeNull()
	})
})
