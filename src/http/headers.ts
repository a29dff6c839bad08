/** Anything a HeaderMap can be built from. Fetch `Headers` is iterable. */
export type HeaderInit =
	| Readonly<Record<string, string | readonly string[]>>
	| Iterable<readonly [string, string]>;

function isPairIterable(init: HeaderInit): init is Iterable<readonly [string, string]> {
	return Symbol.iterator in init;
}

/**
 * Case-insensitive, multi-valued header collection.
 *
 * Names are lowercased on insert. Backed by a Map, so names such as
 * `constructor` or `__proto__` behave like any other header.
 */
export class HeaderMap implements Iterable<readonly [string, string]> {
	private readonly entries = new Map<string, string[]>();

	constructor(init: HeaderInit = {}) {
		if (isPairIterable(init)) {
			for (const [name, value] of init) this.append(name, value);
			return;
		}
		for (const [name, value] of Object.entries(init)) {
			if (typeof value === "string") {
				this.append(name, value);
			} else {
				for (const v of value) this.append(name, v);
			}
		}
	}

	private append(name: string, value: string): void {
		const key = name.toLowerCase();
		const values = this.entries.get(key);
		if (values === undefined) {
			this.entries.set(key, [value]);
		} else {
			values.push(value);
		}
	}

	/** First value for a name, or null when absent. */
	get(name: string): string | null {
		return this.entries.get(name.toLowerCase())?.[0] ?? null;
	}

	/** Every value for a name, in insertion order. */
	getAll(name: string): readonly string[] {
		return this.entries.get(name.toLowerCase()) ?? [];
	}

	has(name: string): boolean {
		return this.entries.has(name.toLowerCase());
	}

	/** Number of distinct header names. */
	get size(): number {
		return this.entries.size;
	}

	/** Every value of every header, names in insertion order. */
	*values(): Generator<string, void, undefined> {
		for (const values of this.entries.values()) yield* values;
	}

	*[Symbol.iterator](): Iterator<readonly [string, string]> {
		for (const [name, values] of this.entries) {
			for (const value of values) yield [name, value];
		}
	}
}
