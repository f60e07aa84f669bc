import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { PassageCache } from "./cache/passage-cache";
import type { Config } from "./config";
import { logger } from "./logger";
import { type BibleMetadata, loadBibleMetadata } from "./metadata/bible-metadata";
import { registerLookupBookTool } from "./tools/lookup-book";
import { registerParsePassageTool } from "./tools/parse-passage";

/**
 * Module-level singletons. They persist across stateless transport requests so
 * the metadata table is read once and the passage cache is shared.
 */
let sharedMetadata: BibleMetadata | null = null;
let sharedCache: PassageCache | null = null;

function getMetadata(config: Config): BibleMetadata {
	if (!sharedMetadata) {
		sharedMetadata = loadBibleMetadata(config.METADATA_PATH);
		logger.info("Loaded metadata for", sharedMetadata.books().length, "books");
	}
	return sharedMetadata;
}

function getCache(config: Config): PassageCache {
	if (!sharedCache) {
		sharedCache = new PassageCache(config.PASSAGE_CACHE_SIZE);
	}
	return sharedCache;
}

/** Reset singleton metadata and cache (for testing). */
export function resetState(): void {
	sharedMetadata = null;
	sharedCache = null;
}

export function registerTools(server: McpServer, config: Config): void {
	const metadata = getMetadata(config);
	const cache = getCache(config);

	registerParsePassageTool(server, {
		metadata,
		cache,
		options: { maxRangeSize: config.MAX_RANGE_SIZE },
	});
	registerLookupBookTool(server, metadata);
	logger.debug("Registered tools: parse_passage, lookup_book");
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(
		{ name: "scripture-refs", version: "0.1.0" },
		{ capabilities: { logging: {} } },
	);

	registerTools(server, config);

	return server;
}
