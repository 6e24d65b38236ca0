/**
 * Source of the absolute game time. Must not go backwards while the process runs.
 */
export interface GameClock {
	currentAbsoluteGameSeconds(): number
	speedFactor(): number
}

export interface GameClockSnapshot {
	gameSeconds: number
	isPaused: boolean
}

export interface RealTimeGameClockOptions {
	speedFactor: number
	// Game seconds already elapsed when the clock starts
	offsetSeconds?: number
	isPaused?: boolean
	now?: () => number
}
