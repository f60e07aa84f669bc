/**
 * Error bookkeeping shared by every reference and collection. Parse problems are
 * recorded as messages on the object that detected them instead of being thrown.
 */
export interface TracksErrors {
	addError(message: string): void;
	clearErrors(): void;
	/** Own messages first, then child messages when includeChildren is true. */
	errors(includeChildren?: boolean): string[];
	hasErrors(): boolean;
	noErrors(): boolean;
}

/** Insertion-ordered list of messages. Duplicates are kept. */
export class ErrorList {
	private messages: string[] = [];

	add(message: string): void {
		this.messages.push(message);
	}

	clear(): void {
		this.messages = [];
	}

	toArray(): string[] {
		return [...this.messages];
	}

	get size(): number {
		return this.messages.length;
	}
}

/** Something that can report errors of its own children. */
interface ErrorSource {
	errors(includeChildren?: boolean): string[];
}

export function collectErrors(
	own: ErrorList,
	children: ErrorSource | undefined,
	includeChildren: boolean,
): string[] {
	const messages = own.toArray();
	if (includeChildren && children) {
		messages.push(...children.errors(true));
	}
	return messages;
}
