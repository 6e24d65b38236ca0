import { ConfigError, UnknownUnitError } from '../errors'
import {
	DEFAULT_UNIT_RATIOS,
	UNIT_ALIASES,
	UNITS,
	type Unit,
	type UnitEntry,
	type UnitOverrides,
	type UnitRatios,
	type UnitTableOptions
} from './types'

export * from './types'

// RATIO_KEYS[i] is the number of UNITS[i] in one UNITS[i + 1]
const RATIO_KEYS: ReadonlyArray<keyof UnitRatios> = [
	'secsPerMin',
	'minsPerHour',
	'hoursPerDay',
	'daysPerWeek',
	'weeksPerMonth',
	'monthsPerYear'
]

/**
 * Resolves a unit name or alias. Plural names (`mins`, `hrs`) are accepted.
 */
export function parseUnit(name: string): Unit {
	const unit = UNIT_ALIASES.get(name)
	if (unit) {
		return unit
	}

	if (name.endsWith('s')) {
		const singular = UNIT_ALIASES.get(name.slice(0, -1))
		if (singular) {
			return singular
		}
	}

	throw new UnknownUnitError(name)
}

/**
 * Builds unit sizes from "how many of the smaller unit fit in the larger one".
 */
export function unitsFromRatios(ratios: Partial<UnitRatios> = {}): UnitOverrides {
	const overrides: UnitOverrides = { sec: 1 }
	let size = 1

	RATIO_KEYS.forEach((key, index) => {
		const ratio = ratios[key] ?? DEFAULT_UNIT_RATIOS[key]
		if (!Number.isInteger(ratio) || ratio < 2) {
			throw new ConfigError(`${key} must be an integer of at least 2, got ${ratio}`)
		}
		size *= ratio
		overrides[UNITS[index + 1]] = size
	})

	return overrides
}

const sizesFrom = (overrides: UnitOverrides, base: readonly number[]): number[] => {
	const sizes = [...base]

	for (const [name, value] of Object.entries(overrides)) {
		let unit: Unit
		try {
			unit = parseUnit(name)
		} catch (error) {
			if (error instanceof UnknownUnitError) {
				throw new ConfigError(`cannot configure unknown unit ${name}`)
			}
			throw error
		}

		if (!Number.isInteger(value) || value <= 0) {
			throw new ConfigError(`size of ${name} must be a positive integer, got ${value}`)
		}
		sizes[UNITS.indexOf(unit)] = value
	}

	return sizes
}

const DEFAULT_SIZES: readonly number[] = sizesFrom(unitsFromRatios(), UNITS.map(() => 1))

/**
 * Sizes of the game time units in base seconds, plus the speed factor.
 * Built once at startup and never mutated.
 */
export class UnitTable {
	private constructor(
		private readonly sizes: readonly number[],
		public readonly speedFactor: number
	) {}

	static configure(options: UnitTableOptions): UnitTable {
		const { speedFactor, units, ratios } = options

		if (typeof speedFactor !== 'number' || !Number.isFinite(speedFactor) || speedFactor <= 0) {
			throw new ConfigError(`speed factor must be a positive number, got ${speedFactor}`)
		}
		if (units && ratios) {
			throw new ConfigError('configure units either by size or by ratio, not both')
		}

		const base = ratios ? sizesFrom(unitsFromRatios(ratios), DEFAULT_SIZES) : DEFAULT_SIZES
		const sizes = sizesFrom(units ?? {}, base)

		if (sizes[0] !== 1) {
			throw new ConfigError(`sec must have size 1, got ${sizes[0]}`)
		}
		for (let i = 1; i < sizes.length; i++) {
			const smaller = sizes[i - 1]
			const larger = sizes[i]
			if (larger <= smaller) {
				throw new ConfigError(`${UNITS[i]} (${larger}) must be larger than ${UNITS[i - 1]} (${smaller})`)
			}
			if (larger % smaller !== 0) {
				throw new ConfigError(`${UNITS[i]} (${larger}) must be a multiple of ${UNITS[i - 1]} (${smaller})`)
			}
		}

		return new UnitTable(Object.freeze(sizes), speedFactor)
	}

	static defaults(speedFactor: number = 1): UnitTable {
		return UnitTable.configure({ speedFactor })
	}

	public sizeOf(name: string): number {
		return this.sizes[UNITS.indexOf(parseUnit(name))]
	}

	/**
	 * Every unit with its size, largest first.
	 */
	public allUnits(): UnitEntry[] {
		return UNITS.map((unit, index) => ({ unit, size: this.sizes[index] })).reverse()
	}

	public distinctSizesDescending(): number[] {
		return Array.from(new Set(this.sizes)).sort((a, b) => b - a)
	}

	public toRecord(): Record<Unit, number> {
		const [sec, min, hour, day, week, month, year] = this.sizes
		return { sec, min, hour, day, week, month, year }
	}
}
