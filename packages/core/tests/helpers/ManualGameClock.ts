import type { GameClock } from '../../src/Clock/types'

export class ManualGameClock implements GameClock {
	constructor(
		private gameSeconds: number = 0,
		private factor: number = 1
	) {}

	currentAbsoluteGameSeconds(): number {
		return this.gameSeconds
	}

	speedFactor(): number {
		return this.factor
	}

	set(gameSeconds: number): void {
		this.gameSeconds = gameSeconds
	}

	advance(gameSeconds: number): void {
		this.gameSeconds += gameSeconds
	}
}
