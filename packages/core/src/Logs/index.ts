export enum LogLevel {
	Debug = 0,
	Info = 1,
	Warn = 2,
	Error = 3,
	None = 4
}

export interface Logger {
	log(...args: unknown[]): void
	info(...args: unknown[]): void
	warn(...args: unknown[]): void
	error(...args: unknown[]): void
	debug(...args: unknown[]): void
}

interface LoggerConfig {
	enabled: boolean
	level: LogLevel
	// false while the component follows the global level
	pinned: boolean
}

const LOG_LEVEL_NAMES: Record<string, LogLevel> = {
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warn: LogLevel.Warn,
	error: LogLevel.Error,
	none: LogLevel.None
}

/**
 * Parses a level name such as `debug` or `WARN`.
 * Returns null for anything that is not a known level.
 */
export function parseLogLevel(value: string): LogLevel | null {
	const level = LOG_LEVEL_NAMES[value.trim().toLowerCase()]
	return level === undefined ? null : level
}

export class LogsManager {
	private loggers = new Map<string, Logger>()
	private configs = new Map<string, LoggerConfig>()
	private globalEnabled: boolean = true

	constructor(private globalLevel: LogLevel = LogLevel.Info) {}

	/**
	 * Get a logger instance for a component
	 * The logger is bound to the component name and prefixes all logs with it
	 * @param componentName Name of the component (e.g., 'ScheduleManager', 'Backend')
	 */
	public getLogger(componentName: string): Logger {
		const existing = this.loggers.get(componentName)
		if (existing) {
			return existing
		}

		const logger: Logger = {
			log: (...args: unknown[]) => this.write(componentName, LogLevel.Info, args),
			info: (...args: unknown[]) => this.write(componentName, LogLevel.Info, args),
			warn: (...args: unknown[]) => this.write(componentName, LogLevel.Warn, args),
			error: (...args: unknown[]) => this.write(componentName, LogLevel.Error, args),
			debug: (...args: unknown[]) => this.write(componentName, LogLevel.Debug, args),
		}

		this.loggers.set(componentName, logger)
		this.configFor(componentName)

		return logger
	}

	private configFor(componentName: string): LoggerConfig {
		let config = this.configs.get(componentName)
		if (!config) {
			config = { enabled: true, level: this.globalLevel, pinned: false }
			this.configs.set(componentName, config)
		}
		return config
	}

	private write(componentName: string, level: LogLevel, args: unknown[]): void {
		if (!this.globalEnabled) {
			return
		}

		const config = this.configFor(componentName)
		if (!config.enabled || level < config.level) {
			return
		}

		const formattedArgs = [`[${componentName}]`, ...args]

		switch (level) {
			case LogLevel.Debug:
				console.debug(...formattedArgs)
				break
			case LogLevel.Info:
				console.log(...formattedArgs)
				break
			case LogLevel.Warn:
				console.warn(...formattedArgs)
				break
			case LogLevel.Error:
				console.error(...formattedArgs)
				break
		}
	}

	public setComponentEnabled(componentName: string, enabled: boolean): void {
		this.configFor(componentName).enabled = enabled
	}

	/**
	 * Set log level for a single component. It stops following the global level.
	 */
	public setComponentLevel(componentName: string, level: LogLevel): void {
		const config = this.configFor(componentName)
		config.level = level
		config.pinned = true
	}

	public setGlobalEnabled(enabled: boolean): void {
		this.globalEnabled = enabled
	}

	/**
	 * Set global log level (applies to all components without their own level)
	 */
	public setGlobalLevel(level: LogLevel): void {
		this.globalLevel = level
		for (const config of this.configs.values()) {
			if (!config.pinned) {
				config.level = level
			}
		}
	}

	public getComponentConfig(componentName: string): { enabled: boolean, level: LogLevel } | null {
		const config = this.configs.get(componentName)
		return config ? { enabled: config.enabled, level: config.level } : null
	}
}
