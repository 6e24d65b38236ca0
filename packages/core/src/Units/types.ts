// Smallest first. A unit's position here is its index everywhere else.
export const UNITS = ['sec', 'min', 'hour', 'day', 'week', 'month', 'year'] as const
export type Unit = (typeof UNITS)[number]

export const UNIT_ALIASES: ReadonlyMap<string, Unit> = new Map<string, Unit>([
	['sec', 'sec'],
	['min', 'min'],
	['hr', 'hour'],
	['hour', 'hour'],
	['day', 'day'],
	['week', 'week'],
	['month', 'month'],
	['year', 'year'],
	['yr', 'year']
])

/**
 * Unit sizes in base (game) seconds, keyed by unit name or alias.
 */
export type UnitOverrides = Record<string, number>

export interface UnitRatios {
	secsPerMin: number
	minsPerHour: number
	hoursPerDay: number
	daysPerWeek: number
	weeksPerMonth: number
	monthsPerYear: number
}

export const DEFAULT_UNIT_RATIOS: UnitRatios = {
	secsPerMin: 60,
	minsPerHour: 60,
	hoursPerDay: 24,
	daysPerWeek: 7,
	weeksPerMonth: 4,
	monthsPerYear: 12
}

export interface UnitEntry {
	unit: Unit
	size: number
}

export interface UnitTableOptions {
	speedFactor: number
	units?: UnitOverrides
	ratios?: Partial<UnitRatios>
}

/**
 * Target values for some units, e.g. `{ hour: 2, min: 30 }`.
 * Units left out keep their current value.
 */
export type PartialTimeSpec = Record<string, number>
