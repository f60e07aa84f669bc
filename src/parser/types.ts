import type { ReferenceCollection } from "./reference-collection";
import type { TracksErrors } from "./tracks-errors";

export interface Reference extends TracksErrors {
	/** Child references, or undefined for leaves and for references that failed to build. */
	readonly children: ReferenceCollection<Reference> | undefined;
	/** True when the reference itself resolved. Children are not considered. */
	isValid(): boolean;
	/** Clean the child collection, returning every reference moved out of it. */
	clean(chain?: boolean): Reference[];
}

export const DEFAULT_MAX_RANGE_SIZE = 10_000;

export interface ParseOptions {
	/** Largest number of chapters or verses a single "A-B" range may expand to. */
	maxRangeSize?: number;
}

export function maxRangeSize(options: ParseOptions): number {
	return options.maxRangeSize ?? DEFAULT_MAX_RANGE_SIZE;
}

/** Leading-integer coercion: "10" -> 10, "-5" -> -5, "invalid" -> 0. */
export function toInteger(value: string | number): number {
	if (typeof value === "number") {
		return Number.isFinite(value) ? Math.trunc(value) : 0;
	}
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Drop trailing punctuation from a captured remainder. A remainder that was
 * captured stays defined even when nothing is left of it ("John," cites no chapters).
 */
export function trimRemainder(raw: string | undefined): string | undefined {
	return raw?.replace(/[^0-9]+$/, "");
}
