export class GameTimeError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'GameTimeError'
	}
}

/**
 * Invalid unit sizes or speed factor. Raised while building the configuration.
 */
export class ConfigError extends GameTimeError {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

export class UnknownUnitError extends GameTimeError {
	constructor(public readonly unitName: string) {
		super(`the unit ${unitName} isn't defined as a valid game time unit`)
		this.name = 'UnknownUnitError'
	}
}

export class UnknownHandlerError extends GameTimeError {
	constructor(public readonly handlerId: string) {
		super(`no schedule handler registered as ${handlerId}`)
		this.name = 'UnknownHandlerError'
	}
}

/**
 * A scheduled handler threw. The original error is kept as `cause`.
 */
export class CallbackError extends GameTimeError {
	constructor(
		public readonly entryId: string,
		public readonly handlerId: string,
		cause: unknown
	) {
		const reason = cause instanceof Error ? cause.message : String(cause)
		super(`handler ${handlerId} failed for schedule ${entryId}: ${reason}`, { cause })
		this.name = 'CallbackError'
	}
}
