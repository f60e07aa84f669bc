import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/** Canonical information about one book: names and the verse count of every chapter. */
export interface BookMetadata {
	readonly name: string;
	readonly shortName: string;
	readonly chapterVerseCounts: readonly number[]; // index i = verses in chapter i + 1
}

export interface MetadataProvider {
	lookup(name: string): BookMetadata | undefined;
}

export class MetadataError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MetadataError";
	}
}

export const DEFAULT_METADATA_PATH = fileURLToPath(
	new URL("../../data/bible-metadata.json", import.meta.url),
);

const BookEntrySchema = z.object({
	name: z.string().min(1),
	shortName: z.string().min(1),
	abbreviations: z.array(z.string().min(1)).default([]),
	chapters: z.array(z.number().int().positive()).min(1),
});

const MetadataTableSchema = z.array(BookEntrySchema).min(1);

export type BookEntry = z.input<typeof BookEntrySchema>;

/**
 * Normalize a book name or abbreviation to its lookup key.
 * Keys are lowercase with all whitespace and periods removed, so
 * "Song of Solomon", "1 Sam." and "MATT" become "songofsolomon", "1sam" and "matt".
 */
export function normalizeBookKey(raw: string): string {
	return raw.toLowerCase().replace(/[\s.]+/g, "");
}

export class BibleMetadata implements MetadataProvider {
	private readonly index = new Map<string, BookMetadata>();

	private constructor(private readonly records: readonly BookMetadata[]) {}

	/**
	 * Build a provider from raw table entries. Throws MetadataError when the
	 * table is malformed or two books claim the same key.
	 */
	static fromEntries(raw: unknown): BibleMetadata {
		const result = MetadataTableSchema.safeParse(raw);
		if (!result.success) {
			const detail = result.error.issues
				.map((i) => `${i.path.join(".")}: ${i.message}`)
				.join(", ");
			throw new MetadataError(`Invalid book metadata: ${detail}`);
		}

		const records = result.data.map((entry) =>
			Object.freeze({
				name: entry.name,
				shortName: entry.shortName,
				chapterVerseCounts: Object.freeze([...entry.chapters]),
			}),
		);
		const metadata = new BibleMetadata(Object.freeze(records));

		result.data.forEach((entry, i) => {
			for (const alias of [entry.name, ...entry.abbreviations]) {
				metadata.register(normalizeBookKey(alias), records[i]);
			}
		});
		return metadata;
	}

	private register(key: string, record: BookMetadata): void {
		const existing = this.index.get(key);
		if (existing && existing !== record) {
			throw new MetadataError(
				`Key '${key}' is claimed by both ${existing.name} and ${record.name}`,
			);
		}
		this.index.set(key, record);
	}

	lookup(name: string): BookMetadata | undefined {
		return this.index.get(normalizeBookKey(name));
	}

	books(): readonly BookMetadata[] {
		return this.records;
	}

	/** Every indexed key paired with the book it resolves to. */
	keys(): [string, BookMetadata][] {
		return [...this.index.entries()];
	}
}

export function loadBibleMetadata(path: string = DEFAULT_METADATA_PATH): BibleMetadata {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf8"));
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new MetadataError(`Could not read book metadata from ${path}: ${message}`);
	}
	return BibleMetadata.fromEntries(raw);
}
