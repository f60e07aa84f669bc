import type { BookMetadata } from "../metadata/bible-metadata";
import type { BookReference } from "./book-reference";
import { chapterOutOfRange, invalidChapterNumber, rangeTooLarge } from "./messages";
import { ReferenceCollection } from "./reference-collection";
import { ErrorList, collectErrors } from "./tracks-errors";
import { type ParseOptions, type Reference, maxRangeSize, toInteger, trimRemainder } from "./types";
import { type VerseReference, parseVersesFor } from "./verse-reference";

/**
 * A chapter and the verses cited in it. With book metadata the chapter number is
 * checked against the book's chapter count; an invalid chapter keeps its error
 * but has no number, raw content or verses.
 */
export class ChapterReference implements Reference {
	readonly number: number | undefined;
	/** Verse list cited for this chapter, e.g. "1-10,15". Undefined means the whole chapter. */
	readonly rawContent: string | undefined;
	readonly metadata: BookMetadata | undefined;
	readonly verseReferences: ReferenceCollection<VerseReference> | undefined;
	private readonly ownErrors = new ErrorList();

	constructor(
		number: string | number,
		rawContent?: string,
		metadata?: BookMetadata,
		options: ParseOptions = {},
	) {
		const n = toInteger(number);
		this.metadata = metadata;

		if (n < 1) {
			this.addError(invalidChapterNumber(n));
			return;
		}

		if (metadata && n > metadata.chapterVerseCounts.length) {
			this.addError(chapterOutOfRange(n, metadata));
			return;
		}

		this.number = n;
		this.rawContent = rawContent;
		this.verseReferences = parseVersesFor(this, options);
	}

	get children(): ReferenceCollection<VerseReference> | undefined {
		return this.verseReferences;
	}

	isValid(): boolean {
		return this.number !== undefined;
	}

	clean(chain = true): Reference[] {
		return this.verseReferences?.clean(chain) ?? [];
	}

	/** Numbers of the verses currently held as valid, in citation order. */
	verseNumbers(): number[] {
		const numbers: number[] = [];
		for (const verse of this.verseReferences ?? []) {
			if (verse.number !== undefined) numbers.push(verse.number);
		}
		return numbers;
	}

	addError(message: string): void {
		this.ownErrors.add(message);
	}

	clearErrors(): void {
		this.ownErrors.clear();
	}

	errors(includeChildren = true): string[] {
		return collectErrors(this.ownErrors, this.verseReferences, includeChildren);
	}

	hasErrors(): boolean {
		return this.errors().length > 0;
	}

	noErrors(): boolean {
		return !this.hasErrors();
	}
}

/*
 * Alternatives in priority order:
 *   1-2: chapter followed by a colon and its verse list ("3:1-10,12")
 *   3-4: chapter range ("4-7")
 *   5:   single chapter, swallowing one trailing separator ("15;")
 */
const CHAPTER_PATTERN = /(\d+):([\d,-]+)|(\d+)-(\d+)|(\d+)[,;]?/g;

/**
 * Book names become separators so "Genesis 1 Exodus 1" doesn't collapse into "11".
 * A separator also goes in front of every "N:" so that in "1:5,10,5:10" the
 * second 5 starts a new chapter rather than continuing chapter 1's verse list.
 */
function prepareChapterText(input: string | number): string {
	return String(input)
		.replace(/[a-zA-Z]+/g, ";")
		.replace(/[^0-9:;,-]/g, "")
		.replace(/(\d+):/g, ";$1:");
}

/**
 * Parse the chapters in a string such as "1:1-10; 5-7, 12:15". Book names in the
 * text are ignored. Chapter ranges expand to one chapter per number (a backwards
 * range expands to nothing); single chapters and ranges carry no verse list.
 *
 *     parseChapters("1:1,5,10;12"); // chapter 1 with "1,5,10", chapter 12
 */
export function parseChapters(
	input: string | number,
	metadata?: BookMetadata,
	options: ParseOptions = {},
): ReferenceCollection<ChapterReference> {
	const chapters = new ReferenceCollection<ChapterReference>();
	const limit = maxRangeSize(options);

	for (const match of prepareChapterText(input).matchAll(CHAPTER_PATTERN)) {
		const [, withVerses, verses, rangeStart, rangeEnd, single] = match;

		if (withVerses !== undefined) {
			chapters.append(new ChapterReference(withVerses, trimRemainder(verses), metadata, options));
			continue;
		}

		if (single !== undefined) {
			chapters.append(new ChapterReference(single, undefined, metadata, options));
			continue;
		}

		const first = toInteger(rangeStart);
		const last = toInteger(rangeEnd);
		if (last - first + 1 > limit) {
			chapters.addError(rangeTooLarge(`${rangeStart}-${rangeEnd}`, limit, "chapters"));
			continue;
		}
		for (let n = first; n <= last; n++) {
			chapters.append(new ChapterReference(n, undefined, metadata, options));
		}
	}

	return chapters;
}

/** Parse the chapters cited by a book, assuming chapter 1 when none are given. */
export function parseChaptersFor(
	book: BookReference,
	options: ParseOptions = {},
): ReferenceCollection<ChapterReference> {
	if (book.rawContent === undefined) {
		return parseChapters(1, book.metadata, options);
	}
	return parseChapters(book.rawContent, book.metadata, options);
}
