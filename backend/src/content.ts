import fs from 'fs/promises'
import type { Logger, ScheduleManager, ScheduleOptions } from '@gametime/core'
import { parseScheduleOptions } from './parsers'

export async function readContentSchedules(filePath: string): Promise<ScheduleOptions[]> {
	const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'))
	if (!Array.isArray(parsed)) {
		throw new Error(`${filePath} must hold an array of schedules`)
	}
	return parsed.map((value: unknown, index: number) => {
		const options = parseScheduleOptions(value, `${filePath}[${index}]`)
		if (!options.id) {
			throw new Error(`${filePath}[${index}] needs an id so it is not scheduled twice`)
		}
		return options
	})
}

/**
 * Schedules content entries that are not already known, e.g. restored from the store.
 * Returns the ids that were added.
 */
export function applyContentSchedules(scheduler: ScheduleManager, schedules: ScheduleOptions[], logger: Logger): string[] {
	const added: string[] = []
	for (const options of schedules) {
		if (options.id && scheduler.getEntry(options.id)) {
			continue
		}
		try {
			added.push(scheduler.schedule(options).id)
		} catch (error) {
			logger.error(`Could not schedule content entry ${options.id}:`, error)
		}
	}
	return added
}
