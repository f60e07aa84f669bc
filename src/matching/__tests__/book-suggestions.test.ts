import { describe, expect, it } from "vitest";
import { BibleMetadata, loadBibleMetadata } from "../../metadata/bible-metadata.js";
import { suggestBooks } from "../book-suggestions.js";

const metadata = loadBibleMetadata();

describe("suggestBooks", () => {
	it("puts the closest book first for a misspelling", () => {
		const suggestions = suggestBooks("Genthesis", metadata);
		expect(suggestions[0].name).toBe("Genesis");
		expect(suggestions.length).toBeLessThanOrEqual(3);
	});

	it("scores an exact abbreviation 100", () => {
		expect(suggestBooks("jon", metadata, 1)).toEqual([{ name: "Jonah", score: 100 }]);
	});

	it("lists each book once, best score first", () => {
		const suggestions = suggestBooks("Exodos", metadata, 10);
		const names = suggestions.map((s) => s.name);
		expect(new Set(names).size).toBe(names.length);
		const scores = suggestions.map((s) => s.score);
		expect(scores).toEqual([...scores].sort((a, b) => b - a));
		expect(names[0]).toBe("Exodus");
	});

	it("returns nothing for blank input", () => {
		expect(suggestBooks("", metadata)).toEqual([]);
		expect(suggestBooks(" . ", metadata)).toEqual([]);
	});

	it("returns nothing when no key comes close", () => {
		expect(suggestBooks("zzzzzzzzzzzz", metadata)).toEqual([]);
	});

	it("keeps canonical order between equal scores", () => {
		const small = BibleMetadata.fromEntries([
			{ name: "Abcd", shortName: "Ab.", chapters: [1] },
			{ name: "Abce", shortName: "Ac.", chapters: [1] },
		]);
		const suggestions = suggestBooks("abcf", small);
		expect(suggestions.map((s) => s.name)).toEqual(["Abcd", "Abce"]);
		expect(suggestions[0].score).toBe(suggestions[1].score);
	});
});
