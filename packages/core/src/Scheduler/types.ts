import type { PartialTimeSpec } from '../Units/types'
import type { TimerHandle } from '../Timers/types'

// Handler arguments are stored with the schedule, so they must survive JSON
export type HandlerArg = string | number | boolean | null
export type ScheduleHandler = (...args: HandlerArg[]) => void

export enum ScheduleStatus {
	PendingArm = 'pending-arm',
	Armed = 'armed',
	Fired = 'fired',
	Done = 'done',
	Cancelled = 'cancelled'
}

export type ScheduleOptions = {
	id?: string // Optional - will be auto-generated if not provided
	handler: string
	args?: HandlerArg[]
	at: PartialTimeSpec
	repeat?: boolean
}

/**
 * What is persisted for a schedule across a suspend. Never holds a closure.
 */
export interface ScheduleState {
	id: string
	handler: string
	args: HandlerArg[]
	target: PartialTimeSpec
	repeat: boolean
	needsRecompute: boolean
	createdAtGame: number
}

export type ScheduleEntry = ScheduleState & {
	status: ScheduleStatus
	timer: TimerHandle | null
	nextFireAtGame: number | null
	lastFiredAtGame: number | null
}

export interface EntryHandle {
	id: string
	delaySeconds: number
}

export interface ScheduledEventData {
	id: string
	handler: string
	repeat: boolean
	delaySeconds: number
	nextFireAtGame: number | null
}

export interface TriggeredEventData {
	id: string
	handler: string
	firedAtGame: number
	failed: boolean
}

export interface ScheduleIdEventData {
	id: string
}

export interface ScheduleCountEventData {
	count: number
}

export type ScheduleResultEventData =
	| ({ success: true } & EntryHandle)
	| { success: false, error: string }

export interface CancelResultEventData {
	success: boolean
	id: string
}
