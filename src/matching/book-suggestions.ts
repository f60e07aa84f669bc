import { ratio } from "fuzzball";
import { type BibleMetadata, normalizeBookKey } from "../metadata/bible-metadata.js";

export interface BookSuggestion {
	name: string;
	score: number; // 0-100
}

const MIN_SCORE = 60;

/**
 * Suggest books for a name that did not resolve. Every full name and
 * abbreviation is scored; a book counts with its best-scoring key.
 */
export function suggestBooks(
	citedName: string,
	metadata: BibleMetadata,
	limit = 3,
): BookSuggestion[] {
	const query = normalizeBookKey(citedName);
	if (!query) return [];

	const best = new Map<string, number>();
	for (const book of metadata.books()) {
		best.set(book.name, 0);
	}
	for (const [key, book] of metadata.keys()) {
		const score = ratio(query, key);
		if (score > (best.get(book.name) ?? 0)) {
			best.set(book.name, score);
		}
	}

	// Map keeps canonical order, and sort is stable, so ties stay in canonical order
	return [...best.entries()]
		.filter(([, score]) => score >= MIN_SCORE)
		.sort((a, b) => b[1] - a[1])
		.slice(0, limit)
		.map(([name, score]) => ({ name, score }));
}
