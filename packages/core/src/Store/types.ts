/**
 * Keyed storage that survives the process. Only touched when the host
 * suspends or resumes.
 */
export interface PersistentStore<T> {
	save(id: string, state: T): Promise<void>
	load(id: string): Promise<T | null>
	delete(id: string): Promise<void>
	list(): Promise<string[]>
}
