export type ToolErrorCode = "PARSE_ERROR" | "INVALID_REFERENCE" | "NOT_FOUND";

export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: ToolErrorCode; message: string; details?: unknown } | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}
