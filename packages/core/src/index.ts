import type { EventManager } from './events'
import { LogsManager, LogLevel } from './Logs'
import { UnitTable } from './Units'
import { TimeConverter, type UnitValue } from './Time'
import { RealTimeGameClock, type GameClock } from './Clock'
import { SetTimeoutTimerHost, type TimerHost } from './Timers'
import { MemorySnapshotStore, type PersistentStore } from './Store'
import { HandlerRegistry, ScheduleManager, type ScheduleState } from './Scheduler'
import { ConfigError } from './errors'
import { resolveConfig, type GameTimeConfig } from './config'

export * from './events'
export * from './errors'
export * from './config'
export * from './Logs'
export * from './Units'
export * from './Time'
export * from './Clock'
export * from './Timers'
export * from './Store'
export * from './Scheduler'
export * from './state/types'
export type { Serializable } from './state/Serializable'
export { Receiver } from './Receiver'

export interface GameTimeDeps {
	clock?: GameClock
	timers?: TimerHost
	store?: PersistentStore<ScheduleState>
	logs?: LogsManager
}

export class GameTimeManager {
	public readonly units: UnitTable
	public readonly converter: TimeConverter
	public readonly clock: GameClock
	public readonly handlers: HandlerRegistry
	public readonly scheduler: ScheduleManager

	constructor(
		private event: EventManager,
		config: Partial<GameTimeConfig> = {},
		deps: GameTimeDeps = {}
	) {
		const resolved = resolveConfig(config)

		const logs = deps.logs ?? new LogsManager(resolved.logLevel ?? LogLevel.Info)
		this.units = UnitTable.configure(resolved)
		this.converter = new TimeConverter(this.units)
		this.clock = deps.clock ?? new RealTimeGameClock({ speedFactor: this.units.speedFactor })

		if (this.clock.speedFactor() !== this.units.speedFactor) {
			throw new ConfigError(`game clock runs at ${this.clock.speedFactor()}x but units are configured for ${this.units.speedFactor}x`)
		}

		this.handlers = new HandlerRegistry()
		this.scheduler = new ScheduleManager(this.event, {
			converter: this.converter,
			clock: this.clock,
			timers: deps.timers ?? new SetTimeoutTimerHost(),
			store: deps.store ?? new MemorySnapshotStore<ScheduleState>(),
			handlers: this.handlers
		}, logs.getLogger('ScheduleManager'))
	}

	public now(): number {
		return this.clock.currentAbsoluteGameSeconds()
	}

	public describeNow(): UnitValue[] {
		return this.converter.describe(this.now())
	}
}
