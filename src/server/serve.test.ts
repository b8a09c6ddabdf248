import { createServer, type Server } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { createTestLogger } from "#core/testing/logger";
import { startStatusServer } from "./serve";

const listen = (server: Server) =>
	new Promise<number>((resolve, reject) => {
		server.once("error", reject);
		server.listen(0, () => {
			const address = server.address();
			if (address === null || typeof address === "string") {
				reject(new Error("expected a TCP address"));
				return;
			}
			resolve(address.port);
		});
	});

describe("startStatusServer", () => {
	const blockers: Server[] = [];

	afterEach(async () => {
		await Promise.all(
			blockers.splice(0).map(
				(blocker) => new Promise<void>((resolve) => blocker.close(() => resolve())),
			),
		);
	});

	it("rejects when the port is already in use", async () => {
		const blocker = createServer();
		blockers.push(blocker);
		const port = await listen(blocker);

		await expect(
			startStatusServer({ port, logger: createTestLogger(), snapshots: () => [] }),
		).rejects.toMatchObject({ code: "EADDRINUSE" });
	});

	it("reports the bound port and closes cleanly", async () => {
		const server = await startStatusServer({
			port: 0,
			logger: createTestLogger(),
			snapshots: () => [],
		});

		expect(server.port).toBeGreaterThan(0);
		await expect(server.close()).resolves.toBeUndefined();
	});
});
