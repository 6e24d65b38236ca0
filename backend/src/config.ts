import path from 'path'
import { ConfigError, LogLevel, parseLogLevel, type GameTimeConfig, type UnitRatios } from '@gametime/core'

export interface ServerConfig {
	port: number
	clientUrl: string
	dataDir: string
	schedulesPath: string
	gameTime: GameTimeConfig
}

type Env = Record<string, string | undefined>

const RATIO_ENV: ReadonlyArray<[keyof UnitRatios, string]> = [
	['secsPerMin', 'SECS_PER_MIN'],
	['minsPerHour', 'MINS_PER_HOUR'],
	['hoursPerDay', 'HOURS_PER_DAY'],
	['daysPerWeek', 'DAYS_PER_WEEK'],
	['weeksPerMonth', 'WEEKS_PER_MONTH'],
	['monthsPerYear', 'MONTHS_PER_YEAR']
]

export const DEFAULT_SCHEDULES_PATH = path.resolve(__dirname, '../../content/schedules.json')

const readNumber = (env: Env, name: string): number | undefined => {
	const raw = env[name]
	if (raw === undefined || raw.trim() === '') {
		return undefined
	}
	const value = Number(raw)
	if (!Number.isFinite(value)) {
		throw new ConfigError(`${name} must be a number, got "${raw}"`)
	}
	return value
}

/**
 * Reads the server configuration from environment variables.
 * Call `dotenv.config()` first to pick up a `.env` file.
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
	const ratios: Partial<UnitRatios> = {}
	for (const [key, name] of RATIO_ENV) {
		const value = readNumber(env, name)
		if (value !== undefined) {
			ratios[key] = value
		}
	}

	let logLevel = LogLevel.Info
	if (env.LOG_LEVEL) {
		const parsed = parseLogLevel(env.LOG_LEVEL)
		if (parsed === null) {
			throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, none, got "${env.LOG_LEVEL}"`)
		}
		logLevel = parsed
	}

	return {
		port: readNumber(env, 'PORT') ?? 3000,
		clientUrl: env.CLIENT_URL || 'http://localhost:5173',
		dataDir: path.resolve(env.DATA_DIR || './data'),
		schedulesPath: env.SCHEDULES_PATH ? path.resolve(env.SCHEDULES_PATH) : DEFAULT_SCHEDULES_PATH,
		gameTime: {
			speedFactor: readNumber(env, 'TIME_FACTOR') ?? 1,
			ratios: Object.keys(ratios).length > 0 ? ratios : undefined,
			logLevel
		}
	}
}
