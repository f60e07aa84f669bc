import { describe, expect, it } from "vitest";
import {
	BibleMetadata,
	MetadataError,
	loadBibleMetadata,
	normalizeBookKey,
} from "../bible-metadata.js";

describe("normalizeBookKey", () => {
	it.each([
		[" 1 Sam. ", "1sam"],
		["Song of Solomon", "songofsolomon"],
		["MATT", "matt"],
		["Gen.", "gen"],
	])("%j -> %s", (raw, expected) => {
		expect(normalizeBookKey(raw)).toBe(expected);
	});
});

describe("loadBibleMetadata", () => {
	const metadata = loadBibleMetadata();

	it("loads all 66 books in canonical order", () => {
		const books = metadata.books();
		expect(books).toHaveLength(66);
		expect(books[0].name).toBe("Genesis");
		expect(books[65].name).toBe("Revelation");
	});

	it.each(["Genesis", "genesis", "GENESIS", "Gen", "gen.", "Gn"])("resolves %j to Genesis", (name) => {
		expect(metadata.lookup(name)?.name).toBe("Genesis");
	});

	it("resolves numbered books with or without spaces", () => {
		expect(metadata.lookup("1 Sam.")?.name).toBe("1 Samuel");
		expect(metadata.lookup("1samuel")?.name).toBe("1 Samuel");
	});

	it("returns book details", () => {
		const genesis = metadata.lookup("genesis");
		expect(genesis?.shortName).toBe("Gen.");
		expect(genesis?.chapterVerseCounts).toHaveLength(50);
		expect(genesis?.chapterVerseCounts[49]).toBe(26);
		expect(metadata.lookup("obadiah")?.chapterVerseCounts).toEqual([21]);
	});

	it("returns undefined for unknown names", () => {
		expect(metadata.lookup("anathema")).toBeUndefined();
		expect(metadata.lookup("")).toBeUndefined();
	});

	it("hands out frozen records", () => {
		const genesis = metadata.lookup("genesis");
		expect(Object.isFrozen(genesis)).toBe(true);
		expect(Object.isFrozen(genesis?.chapterVerseCounts)).toBe(true);
	});

	it("pairs every key with its book", () => {
		const keys = new Map(metadata.keys());
		expect(keys.get("jud")?.name).toBe("Jude");
		expect(keys.get("matt")?.name).toBe("Matthew");
	});

	it("throws MetadataError for a missing file", () => {
		expect(() => loadBibleMetadata("/nonexistent/bible-metadata.json")).toThrow(MetadataError);
		expect(() => loadBibleMetadata("/nonexistent/bible-metadata.json")).toThrow(
			/^Could not read book metadata from \/nonexistent\/bible-metadata\.json: /,
		);
	});
});

describe("BibleMetadata.fromEntries", () => {
	it("builds a provider from plain entries", () => {
		const metadata = BibleMetadata.fromEntries([
			{ name: "Alpha", shortName: "Al.", abbreviations: ["al"], chapters: [3, 4] },
			{ name: "Beta", shortName: "Be.", chapters: [1] },
		]);
		expect(metadata.lookup("AL")?.chapterVerseCounts).toEqual([3, 4]);
		expect(metadata.lookup("beta")?.shortName).toBe("Be.");
		expect(metadata.keys().map(([key]) => key)).toEqual(["alpha", "al", "beta"]);
	});

	it.each([
		["an empty table", []],
		["a non-array", { name: "Alpha" }],
		["a book without chapters", [{ name: "Alpha", shortName: "Al.", chapters: [] }]],
		["a zero verse count", [{ name: "Alpha", shortName: "Al.", chapters: [0] }]],
		["a missing short name", [{ name: "Alpha", chapters: [1] }]],
	])("rejects %s", (_label, raw) => {
		expect(() => BibleMetadata.fromEntries(raw)).toThrow(MetadataError);
		expect(() => BibleMetadata.fromEntries(raw)).toThrow(/^Invalid book metadata: /);
	});

	it("rejects a key claimed by two books", () => {
		const raw = [
			{ name: "Alpha", shortName: "A.", abbreviations: ["x"], chapters: [1] },
			{ name: "Beta", shortName: "B.", abbreviations: ["x"], chapters: [2] },
		];
		expect(() => BibleMetadata.fromEntries(raw)).toThrow("Key 'x' is claimed by both Alpha and Beta");
	});

	it("allows a book to repeat its own key", () => {
		const metadata = BibleMetadata.fromEntries([
			{ name: "Jonah", shortName: "Jonah", abbreviations: ["jonah"], chapters: [17] },
		]);
		expect(metadata.lookup("jonah")?.name).toBe("Jonah");
	});
});
