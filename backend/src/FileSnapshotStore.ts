import fs from 'fs/promises'
import path from 'path'
import type { PersistentStore } from '@gametime/core'

/**
 * Keeps every record of one store in a single JSON file.
 * Writes are queued so concurrent saves never interleave.
 */
export class FileSnapshotStore<T> implements PersistentStore<T> {
	private queue: Promise<void> = Promise.resolve()

	constructor(
		private filePath: string,
		private parse: (value: unknown) => T
	) {}

	async save(id: string, state: T): Promise<void> {
		await this.update(records => {
			records[id] = state
		})
	}

	async load(id: string): Promise<T | null> {
		await this.queue
		const records = await this.read()
		return id in records ? this.parse(records[id]) : null
	}

	async delete(id: string): Promise<void> {
		await this.update(records => {
			delete records[id]
		})
	}

	async list(): Promise<string[]> {
		await this.queue
		return Object.keys(await this.read())
	}

	private update(change: (records: Record<string, unknown>) => void): Promise<void> {
		const next = this.queue.then(async () => {
			const records = await this.read()
			change(records)
			await this.write(records)
		})
		// A failed write must not block the ones queued after it
		this.queue = next.catch(() => undefined)
		return next
	}

	private async read(): Promise<Record<string, unknown>> {
		let raw: string
		try {
			raw = await fs.readFile(this.filePath, 'utf8')
		} catch (error) {
			if (isMissingFile(error)) {
				return {}
			}
			throw error
		}

		const parsed: unknown = JSON.parse(raw)
		if (!isRecord(parsed)) {
			throw new Error(`${this.filePath} does not hold a JSON object`)
		}
		return parsed
	}

	private async write(records: Record<string, unknown>): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true })
		const tmpPath = `${this.filePath}.tmp`
		await fs.writeFile(tmpPath, JSON.stringify(records, null, 2), 'utf8')
		await fs.rename(tmpPath, this.filePath)
	}
}

export const isRecord = (value: unknown): value is Record<string, unknown> => {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const isMissingFile = (error: unknown): boolean => {
	return isRecord(error) && error.code === 'ENOENT'
}
