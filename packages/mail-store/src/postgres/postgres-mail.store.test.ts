import type { CompiledQuery } from "@mailsift/core-contracts";
import { createSilentLogger } from "@mailsift/service-base/testing";
import type pg from "pg";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PostgresMailStore } from "./postgres-mail.store.js";
import {
	INSERT_EMAIL_SQL,
	INSERT_FTS_SQL,
	MATCH_SQL,
	SAMPLE_TEXT_SQL,
	SCHEMA_SQL,
	headlineOptions,
} from "./schema.js";

const fraudQuery: CompiledQuery = {
	expression: { groups: [[{ term: "fraud", alternatives: ["fraud"] }]] },
	text: "'fraud':*",
};

describe("headlineOptions", () => {
	it("should build the ts_headline option string", () => {
		expect(headlineOptions({ words: 10, fragments: 3 })).toBe(
			'StartSel=[, StopSel=], MaxWords=10, MinWords=5, MaxFragments=3, FragmentDelimiter=" ... "',
		);
	});

	it("should keep MinWords below MaxWords for tiny windows", () => {
		expect(headlineOptions({ words: 2, fragments: 1 })).toContain(
			"MaxWords=2, MinWords=1,",
		);
	});
});

type FakeResult = { rows: unknown[] };

function createFakePool() {
	const client = {
		query: vi.fn(
			async (sql: string, _params?: unknown[]): Promise<FakeResult> =>
				sql === INSERT_EMAIL_SQL ? { rows: [{ id: 7 }] } : { rows: [] },
		),
		release: vi.fn((_error?: Error | boolean) => undefined),
	};
	const pool = {
		query: vi.fn(
			async (_sql: string, _params?: unknown[]): Promise<FakeResult> => ({
				rows: [],
			}),
		),
		connect: vi.fn(async () => client),
	};
	return { client, pool };
}

describe("PostgresMailStore", () => {
	let mockClient: ReturnType<typeof createFakePool>["client"];
	let mockPool: ReturnType<typeof createFakePool>["pool"];
	let store: PostgresMailStore;

	beforeEach(() => {
		({ client: mockClient, pool: mockPool } = createFakePool());
		store = new PostgresMailStore(
			mockPool as unknown as pg.Pool,
			createSilentLogger(),
			{ words: 10, fragments: 3 },
		);
	});

	it("should create the schema through the pool", async () => {
		await store.createSchema();

		expect(mockPool.query).toHaveBeenCalledWith(SCHEMA_SQL);
	});

	it("should open one transaction for a batch of writes", async () => {
		const id = await store.insertRecord({
			sourcePath: "maildir/lay-k/1.",
			subject: "Q3 numbers",
			body: "See attached",
		});
		await store.insertIndexEntry(id, "Q3 numbers", "See attached");

		expect(id).toBe(7);
		expect(mockPool.connect).toHaveBeenCalledOnce();
		expect(mockClient.query.mock.calls).toEqual([
			["BEGIN"],
			[
				INSERT_EMAIL_SQL,
				["maildir/lay-k/1.", null, null, null, null, "Q3 numbers", "See attached"],
			],
			[INSERT_FTS_SQL, [7, "Q3 numbers", "See attached"]],
		]);
	});

	it("should begin a new transaction after a commit", async () => {
		await store.insertRecord({ sourcePath: "a", body: "" });
		await store.commit();
		await store.insertRecord({ sourcePath: "b", body: "" });

		const statements = mockClient.query.mock.calls.map((call) => call[0]);
		expect(statements).toEqual([
			"BEGIN",
			INSERT_EMAIL_SQL,
			"COMMIT",
			"BEGIN",
			INSERT_EMAIL_SQL,
		]);
		expect(mockPool.connect).toHaveBeenCalledOnce();
	});

	it("should not commit when nothing was written", async () => {
		await store.commit();

		expect(mockPool.connect).not.toHaveBeenCalled();
		expect(mockClient.query).not.toHaveBeenCalled();
	});

	it("should pass the compiled query and headline options", async () => {
		mockPool.query.mockResolvedValue({
			rows: [
				{
					id: 3,
					subject: "Fraud review",
					sender: "Ken Example",
					sent_at: "Mon, 14 May 2001 16:39:00 -0700",
					source_path: "maildir/lay-k/3.",
					body: "The fraud review is done",
					snippet: "The [fraud] review is done",
					score: -0.6,
				},
			],
		});

		const rows = await store.query(fraudQuery, 5);

		expect(mockPool.query).toHaveBeenCalledWith(MATCH_SQL, [
			"'fraud':*",
			5,
			headlineOptions({ words: 10, fragments: 3 }),
		]);
		expect(rows).toEqual([
			{
				id: 3,
				subject: "Fraud review",
				sender: "Ken Example",
				sentAt: "Mon, 14 May 2001 16:39:00 -0700",
				sourcePath: "maildir/lay-k/3.",
				body: "The fraud review is done",
				snippet: "The [fraud] review is done",
				score: -0.6,
			},
		]);
	});

	it("should sample text in id order after the given id", async () => {
		mockPool.query.mockResolvedValue({
			rows: [{ id: 41, subject: "Hello", body: "World" }],
		});

		await expect(store.sampleText(40, 100)).resolves.toEqual([
			{ id: 41, subject: "Hello", body: "World" },
		]);
		expect(mockPool.query).toHaveBeenCalledWith(SAMPLE_TEXT_SQL, [40, 100]);
	});

	it("should report a missing schema as non-retryable", async () => {
		mockPool.query.mockRejectedValue(
			Object.assign(new Error('relation "email_fts" does not exist'), {
				code: "42P01",
			}),
		);

		await expect(store.query(fraudQuery, 5)).rejects.toMatchObject({
			name: "StoreUnavailableError",
			code: "SCHEMA_MISSING",
			classification: "non_retryable",
		});
	});

	it("should report a refused connection as retryable", async () => {
		mockPool.connect.mockRejectedValue(
			new Error("connect ECONNREFUSED 127.0.0.1:5432"),
		);

		await expect(
			store.insertRecord({ sourcePath: "a", body: "" }),
		).rejects.toMatchObject({
			code: "STORE_UNAVAILABLE",
			classification: "retryable",
		});
	});

	it("should roll back an open batch on close", async () => {
		await store.insertRecord({ sourcePath: "a", body: "" });
		await store.close();

		expect(mockClient.query).toHaveBeenLastCalledWith("ROLLBACK");
		expect(mockClient.release).toHaveBeenCalledWith();
	});

	it("should release without rollback after a commit", async () => {
		await store.insertRecord({ sourcePath: "a", body: "" });
		await store.commit();
		await store.close();

		expect(mockClient.query).not.toHaveBeenCalledWith("ROLLBACK");
		expect(mockClient.release).toHaveBeenCalledOnce();
	});

	it("should destroy the connection when rollback fails", async () => {
		const failure = new Error("rollback failed");
		await store.insertRecord({ sourcePath: "a", body: "" });
		mockClient.query.mockRejectedValueOnce(failure);

		await expect(store.close()).rejects.toBe(failure);
		expect(mockClient.release).toHaveBeenCalledWith(failure);
	});
});
