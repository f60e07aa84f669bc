import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PassageCache } from "../cache/passage-cache.js";
import { logger } from "../logger.js";
import { type BookSuggestion, suggestBooks } from "../matching/book-suggestions.js";
import type { BibleMetadata } from "../metadata/bible-metadata.js";
import { parseBooks } from "../parser/book-reference.js";
import { type PassageSummary, summarizePassage } from "../parser/summary.js";
import type { ParseOptions } from "../parser/types.js";
import { type ToolResponseEnvelope, createToolResponse } from "../types.js";

export interface PassageToolContext {
	metadata: BibleMetadata;
	cache: PassageCache;
	options: ParseOptions;
}

function summarize(passage: string, context: PassageToolContext): PassageSummary {
	const cached = context.cache.get(passage);
	if (cached) {
		logger.debug("Passage cache hit:", passage);
		return cached;
	}

	const books = parseBooks(passage, context.metadata, context.options);
	books.clean();
	const summary = summarizePassage(books);
	context.cache.set(passage, summary);
	return summary;
}

/**
 * Build the tool envelope for a passage. Only passages with no errors at all are
 * valid; otherwise the valid parts are still returned in `metadata`.
 */
export function buildPassageEnvelope(
	passage: string,
	context: PassageToolContext,
): ToolResponseEnvelope {
	const summary = summarize(passage, context);

	if (summary.errors.length === 0) {
		return { valid: true, metadata: { ...summary }, error: null };
	}

	if (summary.books.length === 0 && summary.unresolvedBooks.length === 0) {
		return {
			valid: false,
			metadata: null,
			error: { code: "PARSE_ERROR", message: summary.errors[0] },
		};
	}

	const suggestions: Record<string, BookSuggestion[]> = {};
	for (const name of summary.unresolvedBooks) {
		suggestions[name] = suggestBooks(name, context.metadata);
	}

	return {
		valid: false,
		metadata: { ...summary },
		error: {
			code: "INVALID_REFERENCE",
			message: summary.errors.join("; "),
			details: { errors: summary.errors, suggestions },
		},
	};
}

export function registerParsePassageTool(server: McpServer, context: PassageToolContext): void {
	server.registerTool(
		"parse_passage",
		{
			description:
				"Parse a scripture passage such as 'Gen. 1:15-18, 21; Matt 1' into books, chapters and verses, validated against canonical chapter and verse counts. Invalid parts are reported with error messages; unknown book names come with suggestions.",
			inputSchema: {
				passage: z
					.string()
					.min(1)
					.describe("Passage to parse, e.g., 'John 3:16' or 'Gen. 1:1-5; Ex 20'"),
			},
		},
		async ({ passage }) => {
			logger.debug("parse_passage called with:", passage);
			return createToolResponse(buildPassageEnvelope(passage, context));
		},
	);
}
