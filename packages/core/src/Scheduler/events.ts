export const SchedulerEvents = {
	SS: {
		// Requests
		Schedule: 'ss:scheduler:schedule',
		Cancel: 'ss:scheduler:cancel',
		// Replies to the requesting client
		ScheduleResult: 'ss:scheduler:schedule-result',
		CancelResult: 'ss:scheduler:cancel-result',
		// Notifications
		Scheduled: 'ss:scheduler:scheduled',
		Triggered: 'ss:scheduler:triggered',
		Completed: 'ss:scheduler:completed',
		Cancelled: 'ss:scheduler:cancelled',
		Suspended: 'ss:scheduler:suspended',
		Resumed: 'ss:scheduler:resumed'
	}
} as const
