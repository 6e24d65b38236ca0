import type { ScheduleState } from '../Scheduler/types'

export interface SchedulerSnapshot {
	entries: ScheduleState[]
	suspended: boolean
}
