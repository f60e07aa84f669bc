import type { BookMetadata } from "../metadata/bible-metadata";
import type { ChapterReference } from "./chapter-reference";
import { invalidVerseNumber, invalidVerseRange, rangeTooLarge, verseOutOfRange } from "./messages";
import { ReferenceCollection } from "./reference-collection";
import { ErrorList } from "./tracks-errors";
import { type ParseOptions, type Reference, maxRangeSize, toInteger } from "./types";

/**
 * A single verse. When book metadata and a chapter number are given, the verse
 * is checked against that chapter's verse count.
 */
export class VerseReference implements Reference {
	readonly number: number | undefined;
	readonly children = undefined;
	private readonly ownErrors = new ErrorList();

	constructor(number: string | number, metadata?: BookMetadata, chapterNumber?: number) {
		const n = toInteger(number);

		if (n < 1) {
			this.addError(invalidVerseNumber(n));
			return;
		}

		if (metadata && chapterNumber !== undefined) {
			const versesInChapter = metadata.chapterVerseCounts[chapterNumber - 1] ?? 0;
			if (n > versesInChapter) {
				this.addError(verseOutOfRange(n, metadata, chapterNumber));
				return;
			}
		}

		this.number = n;
	}

	isValid(): boolean {
		return this.number !== undefined;
	}

	/** Verses hold nothing to clean. */
	clean(_chain = true): Reference[] {
		return [];
	}

	addError(message: string): void {
		this.ownErrors.add(message);
	}

	clearErrors(): void {
		this.ownErrors.clear();
	}

	errors(_includeChildren = true): string[] {
		return this.ownErrors.toArray();
	}

	hasErrors(): boolean {
		return this.ownErrors.size > 0;
	}

	noErrors(): boolean {
		return this.ownErrors.size === 0;
	}
}

// A range is tried before a bare number at every position.
const VERSE_PATTERN = /(\d+)-(\d+)|(\d+)/g;

/**
 * Parse a verse list such as "1-10, 15" or "1;5;7". Separators and any other
 * punctuation are ignored; each range expands to one verse per number.
 *
 *     parseVerses("1-3, 5").map((v) => v.number); // [1, 2, 3, 5]
 *     parseVerses("2-1").errors(); // ["'2-1' is an invalid range of verses"]
 */
export function parseVerses(
	input: string | number,
	metadata?: BookMetadata,
	chapterNumber?: number,
	options: ParseOptions = {},
): ReferenceCollection<VerseReference> {
	const verses = new ReferenceCollection<VerseReference>();
	const slim = String(input).replace(/[^0-9:;,-]/g, "");
	const limit = maxRangeSize(options);

	for (const match of slim.matchAll(VERSE_PATTERN)) {
		const [token, rangeStart, rangeEnd, single] = match;

		if (single !== undefined) {
			verses.append(new VerseReference(single, metadata, chapterNumber));
			continue;
		}

		const first = toInteger(rangeStart);
		const last = toInteger(rangeEnd);
		if (last < first) {
			verses.addError(invalidVerseRange(token));
			continue;
		}
		if (last - first + 1 > limit) {
			verses.addError(rangeTooLarge(token, limit, "verses"));
			continue;
		}
		for (let n = first; n <= last; n++) {
			verses.append(new VerseReference(n, metadata, chapterNumber));
		}
	}

	return verses;
}

/**
 * Parse the verses cited by a chapter. With no verse list the whole chapter is
 * assumed when its book is known, otherwise just the first verse.
 */
export function parseVersesFor(
	chapter: ChapterReference,
	options: ParseOptions = {},
): ReferenceCollection<VerseReference> {
	const { number, rawContent, metadata } = chapter;
	if (number === undefined) {
		return new ReferenceCollection<VerseReference>();
	}

	if (rawContent !== undefined) {
		return parseVerses(rawContent, metadata, number, options);
	}

	// The implied range is bounded by the book itself, so the range limit does not apply.
	if (metadata) {
		const versesInChapter = metadata.chapterVerseCounts[number - 1];
		return parseVerses(`1-${versesInChapter}`, metadata, number, {
			...options,
			maxRangeSize: Number.POSITIVE_INFINITY,
		});
	}

	return parseVerses(1, undefined, undefined, options);
}
