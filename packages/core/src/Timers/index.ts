import type { TimerHandle, TimerHost } from './types'

export * from './types'

// setTimeout fires at once for anything above a signed 32-bit millisecond count
export const MAX_TIMEOUT_MS = 2 ** 31 - 1

export class SetTimeoutTimerHost implements TimerHost {
	private timeouts: Map<TimerHandle, NodeJS.Timeout> = new Map()
	private nextHandle: TimerHandle = 1

	public armOnce(delaySeconds: number, onFire: () => void): TimerHandle {
		const handle = this.nextHandle++
		this.armChunk(handle, Math.max(0, delaySeconds * 1000), onFire)
		return handle
	}

	public disarm(handle: TimerHandle): void {
		const timeout = this.timeouts.get(handle)
		if (timeout) {
			clearTimeout(timeout)
			this.timeouts.delete(handle)
		}
	}

	public disarmAll(): void {
		for (const timeout of this.timeouts.values()) {
			clearTimeout(timeout)
		}
		this.timeouts.clear()
	}

	public isArmed(handle: TimerHandle): boolean {
		return this.timeouts.has(handle)
	}

	public get size(): number {
		return this.timeouts.size
	}

	// Long delays are split into several timeouts under the same handle
	private armChunk(handle: TimerHandle, remainingMs: number, onFire: () => void): void {
		const chunkMs = Math.min(remainingMs, MAX_TIMEOUT_MS)
		const timeout = setTimeout(() => {
			if (remainingMs > chunkMs) {
				this.armChunk(handle, remainingMs - chunkMs, onFire)
				return
			}
			this.timeouts.delete(handle)
			onFire()
		}, chunkMs)
		this.timeouts.set(handle, timeout)
	}
}
