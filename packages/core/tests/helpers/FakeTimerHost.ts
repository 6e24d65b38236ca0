import type { TimerHandle, TimerHost } from '../../src/Timers/types'

type ArmedTimer = {
	handle: TimerHandle
	delaySeconds: number
	onFire: () => void
}

/**
 * Keeps armed timers in a list; tests fire them by hand.
 */
export class FakeTimerHost implements TimerHost {
	public armed: ArmedTimer[] = []
	// Every delay ever armed, in order
	public history: number[] = []
	private nextHandle = 1

	armOnce(delaySeconds: number, onFire: () => void): TimerHandle {
		const handle = this.nextHandle++
		this.armed.push({ handle, delaySeconds, onFire })
		this.history.push(delaySeconds)
		return handle
	}

	disarm(handle: TimerHandle): void {
		this.armed = this.armed.filter(timer => timer.handle !== handle)
	}

	latest(): ArmedTimer {
		const timer = this.armed[this.armed.length - 1]
		if (!timer) {
			throw new Error('no timer is armed')
		}
		return timer
	}

	// Fires the most recently armed timer, like the host would once its delay passes
	fireLatest(): void {
		const timer = this.latest()
		this.disarm(timer.handle)
		timer.onFire()
	}
}
