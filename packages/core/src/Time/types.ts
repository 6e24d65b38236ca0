import type { Unit } from '../Units/types'

/**
 * Real-world durations. These never follow the configured game units.
 */
export const REAL_SECONDS = {
	secs: 1,
	mins: 60,
	hrs: 3600,
	days: 86400,
	weeks: 604800,
	months: 2628000,
	yrs: 31536000
} as const

// Divisors used to format a real duration: years, months, weeks, days, hours, minutes
export const REAL_DURATION_LADDER: readonly number[] = [
	REAL_SECONDS.yrs,
	REAL_SECONDS.months,
	REAL_SECONDS.weeks,
	REAL_SECONDS.days,
	REAL_SECONDS.hrs,
	REAL_SECONDS.mins
]

export const REAL_DURATION_KEYS = ['secs', 'mins', 'hrs', 'days', 'weeks', 'months', 'yrs'] as const

export type RealDuration = Partial<Record<(typeof REAL_DURATION_KEYS)[number], number>>

export interface FormatOptions {
	format?: boolean
}

export interface UnitValue {
	unit: Unit
	value: number
}
