import type { BookMetadata } from "../metadata/bible-metadata";

export const bookNotFound = (name: string) => `The book '${name}' could not be found`;

export const noBooks = (passage: string) => `'${passage}' does not contain any books`;

export const invalidChapterNumber = (n: number) => `The chapter number '${n}' is not valid`;

export const chapterOutOfRange = (n: number, book: BookMetadata) =>
	`Chapter '${n}' does not exist for the book ${book.name}`;

export const invalidVerseNumber = (n: number) => `The verse number '${n}' is not valid`;

export const verseOutOfRange = (n: number, book: BookMetadata, chapter: number) =>
	`The verse '${n}' does not exist for ${book.name} ${chapter}`;

export const invalidVerseRange = (range: string) => `'${range}' is an invalid range of verses`;

export const rangeTooLarge = (range: string, limit: number, unit: "chapters" | "verses") =>
	`'${range}' exceeds the maximum of ${limit} ${unit} in a range`;
