import { LRUCache } from "lru-cache";
import type { PassageSummary } from "../parser/summary";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/** Summaries of already parsed passages, keyed by the passage text as given. */
export class PassageCache {
	private readonly cache: LRUCache<string, PassageSummary>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 1000) {
		this.cache = new LRUCache<string, PassageSummary>({ max: maxEntries });
	}

	get(passage: string): PassageSummary | undefined {
		const summary = this.cache.get(passage);
		if (summary !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return summary;
	}

	set(passage: string, summary: PassageSummary): void {
		this.cache.set(passage, summary);
	}

	stats(): CacheStats {
		return {
			size: this.cache.size,
			maxSize: this.cache.max,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
