import type { BookMetadata, MetadataProvider } from "../metadata/bible-metadata";
import { type ChapterReference, parseChaptersFor } from "./chapter-reference";
import { bookNotFound, noBooks } from "./messages";
import { ReferenceCollection } from "./reference-collection";
import { ErrorList, collectErrors } from "./tracks-errors";
import { type ParseOptions, type Reference, trimRemainder } from "./types";

/**
 * A book of the passage and the chapters cited in it.
 *
 *     const book = new BookReference("Matt", "1:1-10", metadata);
 *     book.name; // "Matthew"
 *     book.shortName; // "Matt."
 *     book.chapterReferences?.first()?.number; // 1
 *
 * An unknown name records "The book '<name>' could not be found" and leaves the
 * name, raw content and chapters undefined.
 */
export class BookReference implements Reference {
	/** The name exactly as it was cited. */
	readonly citedName: string;
	readonly name: string | undefined;
	readonly shortName: string | undefined;
	/** Chapters and verses cited for this book, e.g. "1:1-10,25". Undefined means chapter 1. */
	readonly rawContent: string | undefined;
	readonly metadata: BookMetadata | undefined;
	readonly chapterReferences: ReferenceCollection<ChapterReference> | undefined;
	private readonly ownErrors = new ErrorList();

	constructor(
		bookName: string,
		rawContent: string | undefined,
		provider: MetadataProvider,
		options: ParseOptions = {},
	) {
		this.citedName = bookName;
		const metadata = provider.lookup(bookName);

		if (!metadata) {
			this.addError(bookNotFound(bookName));
			return;
		}

		this.metadata = metadata;
		this.name = metadata.name;
		this.shortName = metadata.shortName;
		this.rawContent = rawContent;
		this.chapterReferences = parseChaptersFor(this, options);
	}

	get children(): ReferenceCollection<ChapterReference> | undefined {
		return this.chapterReferences;
	}

	isValid(): boolean {
		return this.name !== undefined;
	}

	/**
	 * Clean the chapter references. With `chain`, valid chapters also clean their
	 * verses, and the removed verses are listed alongside the removed chapters.
	 */
	clean(chain = true): Reference[] {
		return this.chapterReferences?.clean(chain) ?? [];
	}

	addError(message: string): void {
		this.ownErrors.add(message);
	}

	clearErrors(): void {
		this.ownErrors.clear();
	}

	errors(includeChildren = true): string[] {
		return collectErrors(this.ownErrors, this.chapterReferences, includeChildren);
	}

	hasErrors(): boolean {
		return this.errors().length > 0;
	}

	noErrors(): boolean {
		return !this.hasErrors();
	}
}

/*
 * Book name: an optional leading digit ("1 Samuel") then letters.
 * Remainder: the non-letters that follow, minus a final character that runs into
 * the next name. In "Matt1:1,2Sam1:1" the 2 belongs to the next book.
 */
const BOOK_PATTERN = /([0-9]?[a-zA-Z]+)([^a-zA-Z]+(?![a-zA-Z]))?/g;

/**
 * Parse every book in a passage such as "Gen. 1:15-18, 21; Matt 1". Whitespace
 * and punctuation other than ":;,-" are ignored, so "[rev1:15][daniel  12: 1]"
 * works too. A book cited without chapters means its first chapter.
 */
export function parseBooks(
	passage: string,
	provider: MetadataProvider,
	options: ParseOptions = {},
): ReferenceCollection<BookReference> {
	const books = new ReferenceCollection<BookReference>();
	const slim = passage.replace(/[^0-9a-zA-Z:;,-]/g, "");

	for (const match of slim.matchAll(BOOK_PATTERN)) {
		const [, bookName, contents] = match;
		books.append(new BookReference(bookName, trimRemainder(contents), provider, options));
	}

	if (books.isEmpty()) {
		books.addError(noBooks(passage));
	}
	return books;
}
