import type { EventEmitter } from "node:events";

import { serve } from "@hono/node-server";

import type { Logger } from "#core/logger";
import { createStatusApp, type StatusAppOptions } from "#server/app";

export type StatusServer = {
	readonly port: number;
	close: () => Promise<void>;
};

/**
 * Starts the status endpoint. Resolves once the port is bound and rejects
 * when listening fails, e.g. with EADDRINUSE.
 */
export const startStatusServer = (
	options: StatusAppOptions & { port: number; logger: Logger },
): Promise<StatusServer> => {
	const { logger } = options;
	const app = createStatusApp(options);
	return new Promise((resolve, reject) => {
		const server = serve({ fetch: app.fetch, port: options.port }, (info) => {
			events.off("error", reject);
			events.on("error", (error: unknown) => {
				logger.error({ err: error }, "status endpoint error");
			});
			logger.info(`Status endpoint listening on port ${info.port}`);
			resolve({
				port: info.port,
				close: () =>
					new Promise((done, fail) => {
						server.close((error) => (error ? fail(error) : done()));
					}),
			});
		});
		const events: EventEmitter = server;
		events.once("error", reject);
	});
};
