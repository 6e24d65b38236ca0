import { ConfigError } from './errors'
import { LogLevel } from './Logs'
import type { UnitOverrides, UnitRatios } from './Units/types'

export interface GameTimeConfig {
	// Game seconds per real second
	speedFactor: number
	// Unit sizes in game seconds, or ratios between neighbouring units; not both
	units?: UnitOverrides
	ratios?: Partial<UnitRatios>
	logLevel?: LogLevel
}

export const DEFAULT_CONFIG: GameTimeConfig = {
	speedFactor: 1,
	logLevel: LogLevel.Info
}

export function resolveConfig(config: Partial<GameTimeConfig> = {}): GameTimeConfig {
	const resolved: GameTimeConfig = { ...DEFAULT_CONFIG, ...config }
	if (resolved.logLevel !== undefined && LogLevel[resolved.logLevel] === undefined) {
		throw new ConfigError(`unknown log level ${resolved.logLevel}`)
	}
	return resolved
}
