import { describe, expect, it } from 'vitest'
import { GameTimeError } from '@gametime/core'
import { parseClockSnapshot, parseScheduleOptions } from '../src/parsers'

describe('parseScheduleOptions', () => {
	it('accepts a full request body', () => {
		expect(parseScheduleOptions({
			id: 'noon',
			handler: 'announce',
			args: ['Noon', 2, false, null],
			at: { hour: 12, mins: 0 },
			repeat: true
		})).toEqual({
			id: 'noon',
			handler: 'announce',
			args: ['Noon', 2, false, null],
			at: { hour: 12, mins: 0 },
			repeat: true
		})
	})

	it('fills in defaults', () => {
		expect(parseScheduleOptions({ handler: 'announce', at: { min: 5 } })).toEqual({
			id: undefined,
			handler: 'announce',
			args: [],
			at: { min: 5 },
			repeat: undefined
		})
	})

	it('rejects malformed bodies', () => {
		expect(() => parseScheduleOptions('noon')).toThrow(GameTimeError)
		expect(() => parseScheduleOptions({ handler: 'announce', at: { hour: '12' } }, 'request body'))
			.toThrow('request body: target hour must be a number')
		expect(() => parseScheduleOptions({ handler: 'announce', at: {}, args: [{}] }))
			.toThrow('schedule: args must be an array of strings, numbers, booleans or null')
		expect(() => parseScheduleOptions({ at: {} })).toThrow('schedule: handler must be a non-empty string')
		expect(() => parseScheduleOptions({ handler: 'announce', at: { hour: 1.5 } }))
			.toThrow('schedule: target hour must be a non-negative integer, got 1.5')
		expect(() => parseScheduleOptions({ handler: 'announce', at: { hour: -1 } }))
			.toThrow('schedule: target hour must be a non-negative integer, got -1')
		expect(() => parseScheduleOptions({ handler: 'announce', at: {}, repeat: 'yes' })).toThrow('schedule: repeat must be a boolean')
	})
})

describe('parseClockSnapshot', () => {
	it('reads a stored clock', () => {
		expect(parseClockSnapshot({ gameSeconds: 12.5, isPaused: true })).toEqual({ gameSeconds: 12.5, isPaused: true })
	})

	it('rejects anything else', () => {
		expect(() => parseClockSnapshot({ gameSeconds: '12' })).toThrow(GameTimeError)
	})
})
