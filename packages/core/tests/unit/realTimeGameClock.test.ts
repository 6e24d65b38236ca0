import { describe, expect, it } from 'vitest'
import { RealTimeGameClock } from '../../src/Clock'
import { ConfigError } from '../../src/errors'

const createClock = (options: { speedFactor?: number, offsetSeconds?: number } = {}) => {
	let nowMs = 0
	const clock = new RealTimeGameClock({
		speedFactor: options.speedFactor ?? 2,
		offsetSeconds: options.offsetSeconds,
		now: () => nowMs
	})
	return {
		clock,
		setNow: (ms: number) => {
			nowMs = ms
		}
	}
}

describe('RealTimeGameClock', () => {
	it('advances game time by the speed factor', () => {
		const { clock, setNow } = createClock({ offsetSeconds: 100 })

		setNow(1500)

		expect(clock.currentAbsoluteGameSeconds()).toBe(103)
		expect(clock.speedFactor()).toBe(2)
	})

	it('stands still while paused', () => {
		const { clock, setNow } = createClock()

		setNow(1000)
		clock.pause()
		setNow(5000)
		expect(clock.currentAbsoluteGameSeconds()).toBe(2)

		clock.resume()
		setNow(6000)
		expect(clock.currentAbsoluteGameSeconds()).toBe(4)
		expect(clock.isPaused()).toBe(false)
	})

	it('never runs backwards when the real clock does', () => {
		const { clock, setNow } = createClock()

		setNow(3000)
		expect(clock.currentAbsoluteGameSeconds()).toBe(6)
		setNow(1000)
		expect(clock.currentAbsoluteGameSeconds()).toBe(6)
	})

	it('restores its position without counting the downtime', () => {
		const { clock, setNow } = createClock()
		setNow(4000)
		const snapshot = clock.serialize()
		expect(snapshot).toEqual({ gameSeconds: 8, isPaused: false })

		const restored = createClock()
		restored.setNow(100000)
		restored.clock.deserialize(snapshot)
		restored.setNow(101000)

		expect(restored.clock.currentAbsoluteGameSeconds()).toBe(10)
	})

	it('rejects a speed factor that is not positive', () => {
		expect(() => new RealTimeGameClock({ speedFactor: -1 })).toThrow(ConfigError)
	})
})
