import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { extractArchive } from "../../src/fs/extract.js";
import type { MaterializerOptions } from "../../src/fs/materialize.js";
import type { OutputFile } from "../../src/fs/types.js";
import { UntarErrorCode } from "../../src/tar/errors.js";
import {
	chunked,
	createArchive,
	createMemoryLogger,
	pattern,
} from "../fixtures/archive.js";

// Entry names whose output goes to a stub instead of the filesystem.
const { stubs } = vi.hoisted(() => ({ stubs: new Map<string, OutputFile>() }));

vi.mock("../../src/fs/materialize.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../../src/fs/materialize.js")>();
	return {
		...actual,
		createMaterializer: (options: MaterializerOptions) => {
			const materializer = actual.createMaterializer(options);
			return {
				...materializer,
				createFile: async (name: string) =>
					stubs.get(name) ?? materializer.createFile(name),
			};
		},
	};
});

function stubFile(
	write: OutputFile["write"],
	close: OutputFile["close"] = async () => {},
) {
	return {
		write: vi.fn<OutputFile["write"]>(write),
		close: vi.fn<OutputFile["close"]>(close),
	};
}

describe("extractArchive write failures", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "untar-write-test-"));
	});

	afterEach(async () => {
		stubs.clear();
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	const extract = (data: Uint8Array) => {
		const { logger, errors } = createMemoryLogger();
		const run = extractArchive(chunked(data), "test.tar", { cwd: tmpDir, logger });
		return { run, errors };
	};

	it("treats a short write as a failure and drains the rest of the entry", async () => {
		const file = stubFile(async () => 0);
		stubs.set("short.bin", file);
		const archive = createArchive([
			{ name: "short.bin", body: pattern(1500) },
			{ name: "after.txt", body: "still aligned" },
		]);
		const { run, errors } = extract(archive);

		const result = await run;
		expect(result.status).toBe("done");
		expect(result.entries).toBe(2);
		expect(result.failures.map((f) => f.code)).toEqual([
			UntarErrorCode.WRITE_FAILED,
		]);
		expect(result.failures[0]?.path).toBe("short.bin");
		expect(errors).toEqual(["Failed write on short.bin"]);

		expect(file.write).toHaveBeenCalledTimes(1);
		expect(file.write.mock.calls[0]?.[0]).toEqual(pattern(1500).subarray(0, 512));
		expect(file.close).toHaveBeenCalledTimes(1);

		expect(await fs.readFile(path.join(tmpDir, "after.txt"), "utf8")).toBe(
			"still aligned",
		);
	});

	it("reports a failed write once when closing also fails", async () => {
		const closeError = new Error("EIO");
		const file = stubFile(
			async () => 0,
			async () => {
				throw closeError;
			},
		);
		stubs.set("broken.bin", file);
		const archive = createArchive([{ name: "broken.bin", body: pattern(1024) }]);
		const { run, errors } = extract(archive);

		const result = await run;
		expect(result.status).toBe("done");
		expect(result.failures).toHaveLength(1);
		expect(result.failures[0]?.code).toBe(UntarErrorCode.WRITE_FAILED);
		expect(result.failures[0]?.cause).toBe(closeError);
		expect(errors).toEqual(["Failed write on broken.bin"]);
		expect(file.write).toHaveBeenCalledTimes(1);
		expect(file.close).toHaveBeenCalledTimes(1);
	});

	it("reports a failed close after complete writes", async () => {
		const closeError = new Error("ENOSPC");
		const file = stubFile(
			async (chunk) => chunk.length,
			async () => {
				throw closeError;
			},
		);
		stubs.set("flush.bin", file);
		const archive = createArchive([{ name: "flush.bin", body: "abc" }]);
		const { run, errors } = extract(archive);

		const result = await run;
		expect(result.status).toBe("done");
		expect(result.failures).toHaveLength(1);
		expect(result.failures[0]?.cause).toBe(closeError);
		expect(errors).toEqual(["Failed write on flush.bin"]);
		expect(file.write).toHaveBeenCalledTimes(1);
		expect(file.close).toHaveBeenCalledTimes(1);
	});
});
