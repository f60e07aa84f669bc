import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Request, type Response } from "express";
import type { Config } from "./config";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { createServer } from "./server";

function methodNotAllowed(_req: Request, res: Response): void {
	res.writeHead(405).end(
		JSON.stringify({
			jsonrpc: "2.0",
			error: { code: -32000, message: "Method not allowed." },
			id: null,
		}),
	);
}

export function createApp(config?: Config) {
	const resolvedConfig = config ?? loadConfig();
	const app = express();
	app.use(express.json());

	// Stateless Streamable HTTP: a fresh server and transport per request.
	app.post("/mcp", async (req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: undefined,
			});
			res.on("close", () => {
				transport.close().catch((error: unknown) => logger.warn("Transport close failed:", error));
				server.close().catch((error: unknown) => logger.warn("Server close failed:", error));
			});
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
		} catch (error) {
			logger.error("MCP request error:", error);
			if (!res.headersSent) {
				res.status(500).json({
					jsonrpc: "2.0",
					error: { code: -32603, message: "Internal server error" },
					id: null,
				});
			}
		}
	});

	app.get("/mcp", methodNotAllowed);
	app.delete("/mcp", methodNotAllowed);

	app.get("/health", (_req: Request, res: Response) => {
		res.status(200).json({ status: "ok" });
	});

	return app;
}
