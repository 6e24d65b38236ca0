export type TimerHandle = number

export interface TimerHost {
	armOnce(delaySeconds: number, onFire: () => void): TimerHandle
	disarm(handle: TimerHandle): void
}
