import { v4 as uuidv4 } from 'uuid'
import type { EventClient, EventManager } from '../events'
import { Receiver } from '../Receiver'
import { CallbackError, GameTimeError, UnknownHandlerError } from '../errors'
import type { Logger } from '../Logs'
import type { GameClock } from '../Clock/types'
import type { TimerHandle, TimerHost } from '../Timers/types'
import type { PersistentStore } from '../Store/types'
import type { TimeConverter } from '../Time'
import type { PartialTimeSpec } from '../Units/types'
import type { SchedulerSnapshot } from '../state/types'
import { SchedulerEvents } from './events'
import { HandlerRegistry } from './HandlerRegistry'
import { SchedulerState, fromScheduleState, toScheduleState } from './SchedulerState'
import {
	ScheduleStatus,
	type CancelResultEventData,
	type EntryHandle,
	type ScheduleEntry,
	type ScheduleIdEventData,
	type ScheduleOptions,
	type ScheduleResultEventData,
	type ScheduleState,
	type ScheduledEventData,
	type TriggeredEventData
} from './types'

export * from './types'
export { SchedulerEvents } from './events'
export { HandlerRegistry } from './HandlerRegistry'
export { SchedulerState } from './SchedulerState'

export interface SchedulerDeps {
	converter: TimeConverter
	clock: GameClock
	timers: TimerHost
	store: PersistentStore<ScheduleState>
	handlers: HandlerRegistry
}

const formatTarget = (target: PartialTimeSpec): string => {
	return Object.entries(target).map(([unit, value]) => `${unit}=${value}`).join(', ')
}

const errorMessage = (error: unknown): string => {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Fires registered handlers when the game clock reaches a partial target.
 *
 * Every delay is derived from the live game clock: when an entry is armed,
 * after each fire, and again after a suspend. A delay computed before a
 * suspend is never reused.
 */
export class ScheduleManager {
	private readonly state = new SchedulerState()

	constructor(
		private event: EventManager,
		private deps: SchedulerDeps,
		private logger: Logger
	) {
		this.setupEventHandlers()
	}

	private setupEventHandlers() {
		this.event.on(SchedulerEvents.SS.Schedule, (data: ScheduleOptions, client: EventClient) => {
			let result: ScheduleResultEventData
			try {
				result = { success: true, ...this.schedule(data) }
			} catch (error) {
				this.logger.warn(`Schedule request from ${client.id} rejected:`, errorMessage(error))
				result = { success: false, error: errorMessage(error) }
			}
			client.emit(Receiver.Sender, SchedulerEvents.SS.ScheduleResult, result)
		})

		this.event.on(SchedulerEvents.SS.Cancel, (data: ScheduleIdEventData, client: EventClient) => {
			const result: CancelResultEventData = {
				success: this.cancel(data.id),
				id: data.id
			}
			client.emit(Receiver.Sender, SchedulerEvents.SS.CancelResult, result)
		})
	}

	/**
	 * Arms `options.handler` for the next time the game clock matches `options.at`.
	 * Returns the entry id and the real seconds until the first fire.
	 */
	public schedule(options: ScheduleOptions): EntryHandle {
		if (this.state.suspended) {
			throw new GameTimeError('scheduler is suspended, resume it before scheduling')
		}
		if (!this.deps.handlers.has(options.handler)) {
			throw new UnknownHandlerError(options.handler)
		}

		const now = this.deps.clock.currentAbsoluteGameSeconds()
		const delaySeconds = this.deps.converter.resolveNextOccurrence(now, options.at)
		if (delaySeconds <= 0) {
			throw new GameTimeError(`target ${formatTarget(options.at)} has already passed`)
		}

		const id = options.id || uuidv4()
		const existing = this.state.entries.get(id)
		if (existing) {
			this.logger.warn(`Replacing schedule ${id}`)
			this.disarm(existing)
		}

		const entry: ScheduleEntry = {
			id,
			handler: options.handler,
			args: [...(options.args ?? [])],
			target: { ...options.at },
			repeat: options.repeat ?? false,
			needsRecompute: false,
			createdAtGame: now,
			status: ScheduleStatus.PendingArm,
			timer: null,
			nextFireAtGame: null,
			lastFiredAtGame: null
		}
		this.state.entries.set(id, entry)
		this.arm(entry, now, delaySeconds)

		this.event.emit(Receiver.All, SchedulerEvents.SS.Scheduled, {
			id,
			handler: entry.handler,
			repeat: entry.repeat,
			delaySeconds,
			nextFireAtGame: entry.nextFireAtGame
		} satisfies ScheduledEventData)

		return { id, delaySeconds }
	}

	/**
	 * Removes the entry and disarms its timer. Returns false when there was nothing to cancel.
	 */
	public cancel(id: string): boolean {
		if (this.state.suspended) {
			this.state.tombstones.add(id)
		}

		const entry = this.state.entries.get(id)
		if (!entry) {
			return false
		}

		this.disarm(entry)
		entry.status = ScheduleStatus.Cancelled
		this.state.entries.delete(id)
		this.logger.debug(`Cancelled schedule ${id}`)

		this.event.emit(Receiver.All, SchedulerEvents.SS.Cancelled, { id } satisfies ScheduleIdEventData)
		return true
	}

	/**
	 * The host is about to stop or reload. Every entry is disarmed, flagged for
	 * recompute and saved to the store.
	 */
	public async onSuspendNotice(): Promise<number> {
		this.state.suspended = true

		const entries = Array.from(this.state.entries.values())
		for (const entry of entries) {
			this.disarm(entry)
			entry.needsRecompute = true
			entry.status = ScheduleStatus.PendingArm
		}

		await Promise.all(entries.map(entry => this.deps.store.save(entry.id, toScheduleState(entry))))

		this.logger.info(`Suspended ${entries.length} schedule(s)`)
		this.event.emit(Receiver.All, SchedulerEvents.SS.Suspended, { count: entries.length })
		return entries.length
	}

	/**
	 * Restores saved entries and re-arms every pending one against the live clock.
	 * Returns how many entries were armed.
	 */
	public async onResume(): Promise<number> {
		const { store, handlers } = this.deps

		for (const id of await store.list()) {
			const stored = await store.load(id)
			if (!stored) continue

			if (this.state.tombstones.has(id)) {
				await store.delete(id)
				continue
			}

			if (!this.state.entries.has(id)) {
				if (!handlers.has(stored.handler)) {
					// Left in the store until a host registers the handler
					this.logger.warn(`Schedule ${id} uses unregistered handler ${stored.handler}, not restoring it`)
					continue
				}
				this.state.entries.set(id, fromScheduleState(stored))
			}
			await store.delete(id)
		}

		this.state.tombstones.clear()
		this.state.suspended = false

		let armed = 0
		for (const entry of Array.from(this.state.entries.values())) {
			if (entry.status !== ScheduleStatus.PendingArm) continue

			if (!entry.needsRecompute) {
				this.logger.warn(`Schedule ${entry.id} was restored without a suspend notice`)
			}
			entry.needsRecompute = false

			try {
				this.rearm(entry)
			} catch (error) {
				this.logger.error(`Dropping schedule ${entry.id}, its target ${formatTarget(entry.target)} is invalid:`, errorMessage(error))
				this.state.entries.delete(entry.id)
				continue
			}
			if (entry.status === ScheduleStatus.Armed) {
				armed++
			}
		}

		this.logger.info(`Resumed ${armed} schedule(s)`)
		this.event.emit(Receiver.All, SchedulerEvents.SS.Resumed, { count: armed })
		return armed
	}

	/**
	 * Real seconds until the game clock next matches `target`.
	 */
	public realSecondsUntil(target: PartialTimeSpec): number {
		return this.deps.converter.resolveNextOccurrence(this.deps.clock.currentAbsoluteGameSeconds(), target)
	}

	public getEntries(): ScheduleEntry[] {
		return Array.from(this.state.entries.values()).map(entry => ({
			...entry,
			args: [...entry.args],
			target: { ...entry.target }
		}))
	}

	public getEntry(id: string): ScheduleEntry | undefined {
		const entry = this.state.entries.get(id)
		return entry ? { ...entry, args: [...entry.args], target: { ...entry.target } } : undefined
	}

	public isSuspended(): boolean {
		return this.state.suspended
	}

	/* SERIALISATION */
	public serialize(): SchedulerSnapshot {
		return this.state.serialize()
	}

	/**
	 * Replaces every entry with the snapshot's. Nothing is armed until `onResume`.
	 */
	public deserialize(snapshot: SchedulerSnapshot): void {
		for (const entry of this.state.entries.values()) {
			this.disarm(entry)
		}
		this.state.deserialize(snapshot)
	}

	private arm(entry: ScheduleEntry, now: number, delaySeconds: number): void {
		entry.nextFireAtGame = Math.trunc(now) + Math.round(delaySeconds * this.deps.converter.speedFactor)
		const handle = this.deps.timers.armOnce(delaySeconds, () => this.handleFire(entry.id, handle))
		entry.timer = handle
		entry.status = ScheduleStatus.Armed
		this.logger.debug(`Armed schedule ${entry.id} in ${delaySeconds}s (game time ${entry.nextFireAtGame})`)
	}

	private disarm(entry: ScheduleEntry): void {
		if (entry.timer !== null) {
			this.deps.timers.disarm(entry.timer)
			entry.timer = null
		}
	}

	// Reads the clock again instead of trusting the previous projection
	private rearm(entry: ScheduleEntry): void {
		const now = this.deps.clock.currentAbsoluteGameSeconds()
		const delaySeconds = this.deps.converter.resolveNextOccurrence(now, entry.target)
		if (delaySeconds <= 0) {
			this.logger.warn(`Schedule ${entry.id} target ${formatTarget(entry.target)} can no longer be reached`)
			this.finish(entry)
			return
		}
		this.arm(entry, now, delaySeconds)
	}

	private finish(entry: ScheduleEntry): void {
		entry.status = ScheduleStatus.Done
		this.state.entries.delete(entry.id)
		this.event.emit(Receiver.All, SchedulerEvents.SS.Completed, { id: entry.id } satisfies ScheduleIdEventData)
	}

	private handleFire(id: string, handle: TimerHandle): void {
		const entry = this.state.entries.get(id)
		// Cancelled, replaced or suspended after this timer was already on its way
		if (!entry || entry.timer !== handle) {
			this.logger.debug(`Ignoring stale timer for schedule ${id}`)
			return
		}

		entry.timer = null
		entry.status = ScheduleStatus.Fired
		const firedAtGame = this.deps.clock.currentAbsoluteGameSeconds()
		entry.lastFiredAtGame = firedAtGame
		this.logger.debug(`Firing schedule ${id} (${entry.handler}) at game time ${firedAtGame}`)

		let failure: CallbackError | null = null
		try {
			this.deps.handlers.invoke(entry.handler, entry.args)
		} catch (error) {
			failure = new CallbackError(entry.id, entry.handler, error)
		}

		this.event.emit(Receiver.All, SchedulerEvents.SS.Triggered, {
			id,
			handler: entry.handler,
			firedAtGame,
			failed: failure !== null
		} satisfies TriggeredEventData)

		// The handler may have cancelled or replaced its own entry
		if (this.state.entries.get(id) === entry && entry.status === ScheduleStatus.Fired) {
			if (!entry.repeat) {
				this.finish(entry)
			} else if (this.state.suspended) {
				entry.needsRecompute = true
				entry.status = ScheduleStatus.PendingArm
			} else {
				this.rearm(entry)
			}
		}

		if (failure) {
			this.logger.error(failure.message)
			throw failure
		}
	}
}
