/**
 * Typed side channel carried by a request.
 *
 * Each ExtensionKey owns the storage for its values, so reads come back
 * with the key's type and no casting.
 */
export class ExtensionKey<T> {
	private readonly slots = new WeakMap<Extensions, T>();

	constructor(readonly name: string) {}

	read(bag: Extensions): T | undefined {
		return this.slots.get(bag);
	}

	write(bag: Extensions, value: T): void {
		this.slots.set(bag, value);
	}

	has(bag: Extensions): boolean {
		return this.slots.has(bag);
	}
}

export class Extensions {
	private readonly keys = new Set<ExtensionKey<unknown>>();

	insert<T>(key: ExtensionKey<T>, value: T): this {
		key.write(this, value);
		this.keys.add(key);
		return this;
	}

	get<T>(key: ExtensionKey<T>): T | undefined {
		return key.read(this);
	}

	has(key: ExtensionKey<unknown>): boolean {
		return this.keys.has(key);
	}

	get size(): number {
		return this.keys.size;
	}

	/** Names of the keys present, in insertion order. */
	names(): string[] {
		return [...this.keys].map((k) => k.name);
	}
}
