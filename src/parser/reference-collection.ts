import { ErrorList, type TracksErrors } from "./tracks-errors";
import type { Reference } from "./types";

/**
 * An ordered list of references, split into the references still considered
 * valid and the ones `clean` has moved aside. Collections carry their own errors
 * (for problems that produced no reference, such as a backwards verse range) and
 * report the errors of everything they hold.
 *
 *     const books = parseBooks("Genthesis 1:1-10, Matthew 1:5, Rev. 5000", metadata);
 *     books.length; // 3
 *     books.errors(); // ["The book 'Genthesis' could not be found", "Chapter '5000' does not exist for the book Revelation"]
 *     books.clean();
 *     books.length; // 1 (Matthew 1:5)
 *     books.invalidReferences.length; // 2
 *
 * A reference stays in the collection as long as it is valid itself, so a valid
 * book may end up holding only invalid chapters.
 */
export class ReferenceCollection<T extends Reference> implements TracksErrors, Iterable<T> {
	private readonly ownErrors = new ErrorList();
	private items: T[];
	private invalid: Reference[];

	constructor(initialReferences: T[] = [], initialInvalidReferences: Reference[] = []) {
		this.items = [...initialReferences];
		this.invalid = [...initialInvalidReferences];
	}

	get references(): readonly T[] {
		return this.items;
	}

	/** References moved out by `clean`, including ones removed from child collections. */
	get invalidReferences(): readonly Reference[] {
		return this.invalid;
	}

	append(reference: T): this {
		this.items.push(reference);
		return this;
	}

	// --- error tracking ---

	addError(message: string): void {
		this.ownErrors.add(message);
	}

	clearErrors(): void {
		this.ownErrors.clear();
	}

	/** Own errors, then those of invalid references, then valid ones; first occurrence of a message wins. */
	errors(includeChildren = true): string[] {
		const all = this.ownErrors.toArray();
		for (const reference of this.invalid) {
			all.push(...reference.errors(includeChildren));
		}
		for (const reference of this.items) {
			all.push(...reference.errors(includeChildren));
		}
		return [...new Set(all)];
	}

	hasErrors(): boolean {
		return this.errors().length > 0;
	}

	noErrors(): boolean {
		return !this.hasErrors();
	}

	/**
	 * Move invalid references into `invalidReferences`. With `chain`, every valid
	 * reference also cleans its children, and whatever they drop is recorded here
	 * as well. Returns the references removed at this level, then those removed
	 * further down.
	 */
	clean(chain = true): Reference[] {
		const removed: Reference[] = [];
		const removedThroughChain: Reference[] = [];
		const kept: T[] = [];

		for (const reference of this.items) {
			if (!reference.isValid()) {
				removed.push(reference);
				continue;
			}
			kept.push(reference);
			if (chain) {
				removedThroughChain.push(...reference.clean(true));
			}
		}

		this.items = kept;
		const allRemoved = [...removed, ...removedThroughChain];
		this.invalid.push(...allRemoved);
		return allRemoved;
	}

	// --- sequence operations (valid references only) ---

	/** Valid references of both operands; invalid references come from this collection only. */
	union(other: ReferenceCollection<T> | readonly T[]): ReferenceCollection<T> {
		const added = other instanceof ReferenceCollection ? other.references : other;
		return new ReferenceCollection([...this.items, ...added], this.invalid);
	}

	difference(other: ReferenceCollection<T> | readonly T[]): ReferenceCollection<T> {
		const removed = new Set<T>(other instanceof ReferenceCollection ? other.references : other);
		return new ReferenceCollection(
			this.items.filter((reference) => !removed.has(reference)),
			this.invalid,
		);
	}

	at(index: number): T | undefined {
		return this.items.at(index);
	}

	first(): T | undefined {
		return this.items[0];
	}

	last(): T | undefined {
		return this.items[this.items.length - 1];
	}

	get length(): number {
		return this.items.length;
	}

	isEmpty(): boolean {
		return this.items.length === 0;
	}

	map<U>(fn: (reference: T, index: number) => U): U[] {
		return this.items.map(fn);
	}

	[Symbol.iterator](): Iterator<T> {
		return this.items[Symbol.iterator]();
	}
}
