import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { suggestBooks } from "../matching/book-suggestions.js";
import type { BibleMetadata } from "../metadata/bible-metadata.js";
import { bookNotFound } from "../parser/messages.js";
import { type ToolResponseEnvelope, createToolResponse } from "../types.js";

export function buildBookEnvelope(name: string, metadata: BibleMetadata): ToolResponseEnvelope {
	const book = metadata.lookup(name);
	if (!book) {
		return {
			valid: false,
			metadata: { suggestions: suggestBooks(name, metadata) },
			error: { code: "NOT_FOUND", message: bookNotFound(name) },
		};
	}
	return {
		valid: true,
		metadata: {
			name: book.name,
			shortName: book.shortName,
			chapters: book.chapterVerseCounts.length,
			verseCounts: [...book.chapterVerseCounts],
		},
		error: null,
	};
}

export function registerLookupBookTool(server: McpServer, metadata: BibleMetadata): void {
	server.registerTool(
		"lookup_book",
		{
			description:
				"Look up a book of the Bible by full name or abbreviation (case, spaces and periods are ignored). Returns its canonical name, short name and the verse count of every chapter.",
			inputSchema: {
				name: z.string().min(1).describe("Book name or abbreviation, e.g., 'Matt.' or '1 Sam'"),
			},
		},
		async ({ name }) => createToolResponse(buildBookEnvelope(name, metadata)),
	);
}
