import type { UnitTable } from '../Units'
import type { PartialTimeSpec } from '../Units/types'
import { REAL_DURATION_KEYS, REAL_DURATION_LADDER, REAL_SECONDS, type FormatOptions, type RealDuration, type UnitValue } from './types'

export * from './types'

/**
 * Splits a number of seconds into even dividends of the given divisors.
 *
 * The seconds are integer-divided by the first divisor, the remainder by the
 * second and so on. The result has `divisors.length + 1` entries, the last
 * one being the seconds left over.
 */
export function breakdown(totalSeconds: number, divisors: readonly number[]): number[] {
	let seconds = Math.trunc(totalSeconds)
	const results: number[] = []

	for (const divisor of divisors) {
		if (!Number.isInteger(divisor) || divisor <= 0) {
			throw new RangeError(`divisors must be positive integers, got ${divisor}`)
		}
		const quotient = Math.floor(seconds / divisor)
		results.push(quotient)
		seconds -= quotient * divisor
	}
	results.push(seconds)

	return results
}

interface ResolvedTarget {
	index: number
	value: number
}

export class TimeConverter {
	constructor(private readonly units: UnitTable) {}

	public get speedFactor(): number {
		return this.units.speedFactor
	}

	/**
	 * How much game time passes during a real-world duration.
	 * Formatted output follows the configured units, largest first.
	 */
	public realToGame(real: number | RealDuration, options: { format: true }): number[]
	public realToGame(real: number | RealDuration, options?: { format?: false }): number
	public realToGame(real: number | RealDuration, options?: FormatOptions): number | number[]
	public realToGame(real: number | RealDuration, options: FormatOptions = {}): number | number[] {
		const realSeconds = typeof real === 'number' ? real : realDurationSeconds(real)
		const gameSeconds = realSeconds * this.units.speedFactor

		if (options.format) {
			return breakdown(gameSeconds, this.unitDivisors())
		}
		return gameSeconds
	}

	/**
	 * Real seconds it takes for the given amount of game time to pass.
	 * e.g. `gameToReal({ days: 2 })`
	 */
	public gameToReal(components: PartialTimeSpec, options: { format: true }): number[]
	public gameToReal(components: PartialTimeSpec, options?: { format?: false }): number
	public gameToReal(components: PartialTimeSpec, options?: FormatOptions): number | number[]
	public gameToReal(components: PartialTimeSpec, options: FormatOptions = {}): number | number[] {
		let gameSeconds = 0
		for (const [name, value] of Object.entries(components)) {
			gameSeconds += value * this.units.sizeOf(name)
		}

		const realSeconds = gameSeconds / this.units.speedFactor
		if (options.format) {
			return breakdown(realSeconds, REAL_DURATION_LADDER)
		}
		return realSeconds
	}

	/**
	 * Real seconds until the game clock next matches `partial`.
	 *
	 * Units missing from `partial` keep their value from `currentGame`. When the
	 * projected time is not in the future, the unit right above the largest
	 * targeted unit is advanced by one (the largest unit itself when nothing
	 * sits above it).
	 */
	public resolveNextOccurrence(currentGame: number, partial: PartialTimeSpec): number {
		const units = this.units.distinctSizesDescending()
		const targets = this.resolveTargets(units, partial)
		const current = Math.trunc(currentGame)
		const divisors = breakdown(current, units.slice(0, -1))

		let higherUnit: number | null = null
		for (const { index, value } of targets) {
			divisors[index] = value
			if (higherUnit === null || index < higherUnit) {
				higherUnit = index
			}
		}

		let projected = project(divisors, units)
		if (projected <= current) {
			if (higherUnit) {
				divisors[higherUnit - 1] += 1
			} else {
				divisors[0] += 1
			}
			projected = project(divisors, units)
		}

		return (projected - current) / this.units.speedFactor
	}

	/**
	 * Labelled breakdown of an absolute game time, largest unit first.
	 */
	public describe(gameSeconds: number): UnitValue[] {
		const values = breakdown(gameSeconds, this.unitDivisors())
		return this.units.allUnits().map(({ unit }, index) => ({ unit, value: values[index] }))
	}

	private unitDivisors(): number[] {
		return this.units.distinctSizesDescending().slice(0, -1)
	}

	// Validates every name and value before anything is computed
	private resolveTargets(units: number[], partial: PartialTimeSpec): ResolvedTarget[] {
		return Object.entries(partial).map(([name, value]) => {
			const index = units.indexOf(this.units.sizeOf(name))
			if (!Number.isInteger(value) || value < 0) {
				throw new RangeError(`target for ${name} must be a non-negative integer, got ${value}`)
			}
			return { index, value }
		})
	}
}

const project = (values: number[], units: number[]): number => {
	return values.reduce((total, value, index) => total + value * units[index], 0)
}

const realDurationSeconds = (duration: RealDuration): number => {
	let seconds = 0
	for (const key of REAL_DURATION_KEYS) {
		seconds += (duration[key] ?? 0) * REAL_SECONDS[key]
	}
	return seconds
}
