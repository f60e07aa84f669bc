import { parseBooks } from "./book-reference";

export { BookReference, parseBooks } from "./book-reference";
export { ChapterReference, parseChapters, parseChaptersFor } from "./chapter-reference";
export { VerseReference, parseVerses, parseVersesFor } from "./verse-reference";
export { ReferenceCollection } from "./reference-collection";
export { ErrorList } from "./tracks-errors";
export { DEFAULT_MAX_RANGE_SIZE } from "./types";
export { compressNumbers, summarizePassage } from "./summary";
export {
	BibleMetadata,
	MetadataError,
	loadBibleMetadata,
	normalizeBookKey,
} from "../metadata/bible-metadata";

export type { TracksErrors } from "./tracks-errors";
export type { ParseOptions, Reference } from "./types";
export type { BookSummary, ChapterSummary, PassageSummary } from "./summary";
export type { BookMetadata, MetadataProvider } from "../metadata/bible-metadata";

/** Parse a passage into book references. Same as `parseBooks`. */
export const parse = parseBooks;
