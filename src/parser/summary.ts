import { BookReference } from "./book-reference";
import type { ChapterReference } from "./chapter-reference";
import type { ReferenceCollection } from "./reference-collection";

export interface ChapterSummary {
	number: number;
	verses: number[];
}

export interface BookSummary {
	name: string;
	shortName: string;
	reference: string; // e.g. "Gen. 1:1-3,5; 2"
	chapters: ChapterSummary[];
}

export interface PassageSummary {
	books: BookSummary[];
	unresolvedBooks: string[]; // names as cited
	errors: string[];
}

/** Render numbers as comma-separated runs: [3, 1, 2, 5] -> "1-3,5". */
export function compressNumbers(numbers: readonly number[]): string {
	const sorted = [...new Set(numbers)].sort((a, b) => a - b);
	const runs: string[] = [];
	let start = 0;
	for (let i = 1; i <= sorted.length; i++) {
		if (i < sorted.length && sorted[i] === sorted[i - 1] + 1) continue;
		const first = sorted[start];
		const last = sorted[i - 1];
		runs.push(first === last ? `${first}` : `${first}-${last}`);
		start = i;
	}
	return runs.join(",");
}

function citesWholeChapter(chapter: ChapterReference, verses: readonly number[]): boolean {
	if (chapter.number === undefined || !chapter.metadata) return false;
	const versesInChapter = chapter.metadata.chapterVerseCounts[chapter.number - 1];
	return compressNumbers(verses) === (versesInChapter === 1 ? "1" : `1-${versesInChapter}`);
}

/**
 * JSON-friendly view of the valid parts of a parsed passage, cleaned or not.
 * Chapters left with no valid verses are omitted; `errors` covers everything
 * that was dropped.
 */
export function summarizePassage(books: ReferenceCollection<BookReference>): PassageSummary {
	const summaries: BookSummary[] = [];
	const unresolvedBooks: string[] = [];

	for (const reference of books.invalidReferences) {
		if (reference instanceof BookReference) unresolvedBooks.push(reference.citedName);
	}

	for (const book of books) {
		if (book.name === undefined || book.shortName === undefined) {
			unresolvedBooks.push(book.citedName);
			continue;
		}

		const chapters: ChapterSummary[] = [];
		const parts: string[] = [];
		for (const chapter of book.chapterReferences ?? []) {
			const verses = chapter.verseNumbers();
			if (chapter.number === undefined || verses.length === 0) continue;
			chapters.push({ number: chapter.number, verses });
			parts.push(
				citesWholeChapter(chapter, verses)
					? `${chapter.number}`
					: `${chapter.number}:${compressNumbers(verses)}`,
			);
		}

		summaries.push({
			name: book.name,
			shortName: book.shortName,
			reference: parts.length > 0 ? `${book.shortName} ${parts.join("; ")}` : book.shortName,
			chapters,
		});
	}

	return { books: summaries, unresolvedBooks, errors: books.errors() };
}
