/**
 * Fixed-capacity ring buffer. Pushing past capacity overwrites the oldest
 * entry, so the bound holds at every insertion.
 */
export class BoundedLog<T> {
	private readonly slots: Array<T | undefined>;
	private head = 0;
	private count = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`BoundedLog capacity must be a positive integer, got ${capacity}`);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	/**
	 * Append an entry. Returns the evicted entry when the log was full.
	 */
	push(value: T): T | undefined {
		const tail = (this.head + this.count) % this.capacity;
		if (this.count < this.capacity) {
			this.slots[tail] = value;
			this.count++;
			return undefined;
		}
		const evicted = this.slots[this.head];
		this.slots[this.head] = value;
		this.head = (this.head + 1) % this.capacity;
		return evicted;
	}

	clear(): void {
		this.slots.fill(undefined);
		this.head = 0;
		this.count = 0;
	}

	/** Oldest first. */
	toArray(): T[] {
		const out: T[] = [];
		for (const value of this) {
			out.push(value);
		}
		return out;
	}

	*[Symbol.iterator](): IterableIterator<T> {
		for (let i = 0; i < this.count; i++) {
			const value = this.slots[(this.head + i) % this.capacity];
			if (value !== undefined) {
				yield value;
			}
		}
	}
}
