import type { PersistentStore } from './types'

export * from './types'

/**
 * In-process store. States are copied on the way in and out, so callers
 * never share an object with the store.
 */
export class MemorySnapshotStore<T> implements PersistentStore<T> {
	private records: Map<string, T> = new Map()

	async save(id: string, state: T): Promise<void> {
		this.records.set(id, structuredClone(state))
	}

	async load(id: string): Promise<T | null> {
		const record = this.records.get(id)
		return record === undefined ? null : structuredClone(record)
	}

	async delete(id: string): Promise<void> {
		this.records.delete(id)
	}

	async list(): Promise<string[]> {
		return Array.from(this.records.keys())
	}
}
