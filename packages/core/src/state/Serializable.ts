/**
 * Components whose state has to outlive the process implement this.
 */
export interface Serializable<T> {
	serialize(): T
	deserialize(state: T): void
}
