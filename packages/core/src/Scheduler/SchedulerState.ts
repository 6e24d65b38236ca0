import { ScheduleStatus, type ScheduleEntry, type ScheduleState } from './types'
import type { Serializable } from '../state/Serializable'
import type { SchedulerSnapshot } from '../state/types'

export const toScheduleState = (entry: ScheduleEntry): ScheduleState => ({
	id: entry.id,
	handler: entry.handler,
	args: [...entry.args],
	target: { ...entry.target },
	repeat: entry.repeat,
	needsRecompute: entry.needsRecompute,
	createdAtGame: entry.createdAtGame
})

// Restored entries wait for the next resume to be armed
export const fromScheduleState = (state: ScheduleState): ScheduleEntry => ({
	...state,
	args: [...state.args],
	target: { ...state.target },
	status: ScheduleStatus.PendingArm,
	timer: null,
	nextFireAtGame: null,
	lastFiredAtGame: null
})

export class SchedulerState implements Serializable<SchedulerSnapshot> {
	public entries: Map<string, ScheduleEntry> = new Map()
	// Ids cancelled while suspended, so resume does not bring them back
	public tombstones: Set<string> = new Set()
	public suspended = false

	/* SERIALISATION */
	public serialize(): SchedulerSnapshot {
		return {
			entries: Array.from(this.entries.values()).map(toScheduleState),
			suspended: this.suspended
		}
	}

	public deserialize(state: SchedulerSnapshot): void {
		this.entries.clear()
		this.tombstones.clear()
		for (const stored of state.entries) {
			const entry = fromScheduleState(stored)
			entry.needsRecompute = true
			this.entries.set(entry.id, entry)
		}
		this.suspended = true
	}
}
