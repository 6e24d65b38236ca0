import { ConfigError } from '../errors'
import type { Serializable } from '../state/Serializable'
import type { GameClock, GameClockSnapshot, RealTimeGameClockOptions } from './types'

export * from './types'

/**
 * Game clock driven by the real clock of this process.
 *
 * Time only advances while the clock runs, so game time stands still while
 * the process is down or the clock is paused. Restore it with `deserialize`.
 */
export class RealTimeGameClock implements GameClock, Serializable<GameClockSnapshot> {
	private readonly factor: number
	private readonly now: () => number
	private baseGameSeconds: number
	private anchorMs: number
	private paused: boolean
	private lastReading = 0

	constructor(options: RealTimeGameClockOptions) {
		if (!Number.isFinite(options.speedFactor) || options.speedFactor <= 0) {
			throw new ConfigError(`speed factor must be a positive number, got ${options.speedFactor}`)
		}
		this.factor = options.speedFactor
		this.now = options.now ?? Date.now
		this.baseGameSeconds = Math.max(0, options.offsetSeconds ?? 0)
		this.anchorMs = this.now()
		this.paused = options.isPaused ?? false
	}

	public currentAbsoluteGameSeconds(): number {
		return Math.floor(this.exactGameSeconds())
	}

	public speedFactor(): number {
		return this.factor
	}

	public pause(): void {
		if (this.paused) return
		this.baseGameSeconds = this.exactGameSeconds()
		this.paused = true
	}

	public resume(): void {
		if (!this.paused) return
		this.anchorMs = this.now()
		this.paused = false
	}

	public isPaused(): boolean {
		return this.paused
	}

	/* SERIALISATION */
	public serialize(): GameClockSnapshot {
		return {
			gameSeconds: this.exactGameSeconds(),
			isPaused: this.paused
		}
	}

	public deserialize(state: GameClockSnapshot): void {
		this.baseGameSeconds = Math.max(0, state.gameSeconds)
		this.anchorMs = this.now()
		this.paused = state.isPaused
		this.lastReading = this.baseGameSeconds
	}

	private exactGameSeconds(): number {
		if (this.paused) {
			return this.baseGameSeconds
		}
		const elapsedMs = this.now() - this.anchorMs
		// A real clock stepping backwards must not rewind game time
		this.lastReading = Math.max(this.lastReading, this.baseGameSeconds + (elapsedMs / 1000) * this.factor)
		return this.lastReading
	}
}
