import { describe, expect, it } from "vitest";
import { PassageCache } from "../../cache/passage-cache.js";
import { suggestBooks } from "../../matching/book-suggestions.js";
import { loadBibleMetadata } from "../../metadata/bible-metadata.js";
import { type PassageToolContext, buildPassageEnvelope } from "../parse-passage.js";

const metadata = loadBibleMetadata();

function makeContext(options: PassageToolContext["options"] = {}): PassageToolContext {
	return { metadata, cache: new PassageCache(), options };
}

describe("buildPassageEnvelope", () => {
	it("returns a valid envelope for a clean passage", () => {
		const envelope = buildPassageEnvelope("John 3:16", makeContext());

		expect(envelope).toEqual({
			valid: true,
			metadata: {
				books: [
					{
						name: "John",
						shortName: "John",
						reference: "John 3:16",
						chapters: [{ number: 3, verses: [16] }],
					},
				],
				unresolvedBooks: [],
				errors: [],
			},
			error: null,
		});
	});

	it("returns PARSE_ERROR when nothing looks like a book", () => {
		const envelope = buildPassageEnvelope("3:16", makeContext());

		expect(envelope).toEqual({
			valid: false,
			metadata: null,
			error: { code: "PARSE_ERROR", message: "'3:16' does not contain any books" },
		});
	});

	it("returns INVALID_REFERENCE with suggestions for an unknown book", () => {
		const envelope = buildPassageEnvelope("Genthesis 1:1, John 3:16", makeContext());

		expect(envelope.valid).toBe(false);
		expect(envelope.metadata).toMatchObject({
			unresolvedBooks: ["Genthesis"],
			books: [{ reference: "John 3:16" }],
		});
		expect(envelope.error).toEqual({
			code: "INVALID_REFERENCE",
			message: "The book 'Genthesis' could not be found",
			details: {
				errors: ["The book 'Genthesis' could not be found"],
				suggestions: { Genthesis: suggestBooks("Genthesis", metadata) },
			},
		});
	});

	it("joins every error into the message", () => {
		const envelope = buildPassageEnvelope("Exodus 1:99, Genesis 51", makeContext());

		expect(envelope.error).toEqual({
			code: "INVALID_REFERENCE",
			message:
				"The verse '99' does not exist for Exodus 1; Chapter '51' does not exist for the book Genesis",
			details: {
				errors: [
					"The verse '99' does not exist for Exodus 1",
					"Chapter '51' does not exist for the book Genesis",
				],
				suggestions: {},
			},
		});
	});

	it("applies the range limit from its options", () => {
		const envelope = buildPassageEnvelope("Ps 119:1-176", makeContext({ maxRangeSize: 100 }));

		expect(envelope.valid).toBe(false);
		expect(envelope.error?.message).toBe("'1-176' exceeds the maximum of 100 verses in a range");
		expect(envelope.metadata).toMatchObject({
			books: [{ name: "Psalms", reference: "Ps.", chapters: [] }],
		});
	});

	it("returns a whole chapter cited without verses past the range limit", () => {
		const envelope = buildPassageEnvelope("Ps 119", makeContext({ maxRangeSize: 100 }));

		expect(envelope.valid).toBe(true);
		expect(envelope.metadata).toMatchObject({
			books: [{ name: "Psalms", reference: "Ps. 119" }],
		});
	});

	it("serves a repeated passage from the cache", () => {
		const context = makeContext();

		const first = buildPassageEnvelope("Gen. 1:1-3", context);
		const second = buildPassageEnvelope("Gen. 1:1-3", context);

		expect(second).toEqual(first);
		expect(context.cache.stats()).toEqual({ size: 1, maxSize: 1000, hits: 1, misses: 1 });
	});
});
