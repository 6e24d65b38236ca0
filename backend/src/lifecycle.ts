import type {
	GameClockSnapshot,
	GameTimeManager,
	Logger,
	PersistentStore,
	RealTimeGameClock,
	ScheduleOptions
} from '@gametime/core'
import { applyContentSchedules } from './content'

export const CLOCK_KEY = 'clock'

export interface StartupResult {
	restored: number
	added: string[]
}

/**
 * Puts the clock back where the last run stopped it. The clock runs again
 * from there; time spent down is not counted.
 */
export async function restoreClock(clock: RealTimeGameClock, store: PersistentStore<GameClockSnapshot>): Promise<boolean> {
	const saved = await store.load(CLOCK_KEY)
	if (!saved) {
		return false
	}
	clock.deserialize(saved)
	clock.resume()
	return true
}

/**
 * Restores stored schedules against the live clock, then adds content
 * schedules that were not restored. Handlers must already be registered.
 */
export async function startGameTime(
	gameTime: GameTimeManager,
	contentSchedules: ScheduleOptions[],
	logger: Logger
): Promise<StartupResult> {
	const restored = await gameTime.scheduler.onResume()
	const added = applyContentSchedules(gameTime.scheduler, contentSchedules, logger)
	return { restored, added }
}

export async function suspendGameTime(
	gameTime: GameTimeManager,
	clock: RealTimeGameClock,
	store: PersistentStore<GameClockSnapshot>
): Promise<void> {
	await gameTime.scheduler.onSuspendNotice()
	clock.pause()
	await store.save(CLOCK_KEY, clock.serialize())
}
