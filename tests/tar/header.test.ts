import { describe, expect, it } from "vitest";
import {
	TYPEFLAG,
	USTAR_MAGIC_OFFSET,
	USTAR_NAME_OFFSET,
	USTAR_TYPEFLAG_OFFSET,
} from "../../src/tar/constants.js";
import { parseHeader, toEntryType } from "../../src/tar/header.js";
import { createHeader, encoder } from "../fixtures/archive.js";

describe("header parsing", () => {
	it("parses name, mode, size and type", () => {
		const header = createHeader({ name: "a.txt", body: "hello" });

		expect(parseHeader(header)).toEqual({
			name: "a.txt",
			mode: 0o644,
			size: 5,
			type: "file",
		});
	});

	it("parses a directory entry", () => {
		const header = createHeader({ name: "sub/", type: "directory", mode: 0o750 });

		expect(parseHeader(header)).toEqual({
			name: "sub/",
			mode: 0o750,
			size: 0,
			type: "directory",
		});
	});

	it("maps every known type flag", () => {
		for (const [type, flag] of Object.entries(TYPEFLAG)) {
			expect(toEntryType(flag.charCodeAt(0))).toBe(type);
		}
	});

	it("treats a NUL type flag as a regular file", () => {
		const header = createHeader({ name: "old.txt" });
		header[USTAR_TYPEFLAG_OFFSET] = 0;

		expect(parseHeader(header).type).toBe("file");
	});

	it("treats unknown type flags as regular files", () => {
		expect(toEntryType("7".charCodeAt(0))).toBe("file");
		expect(toEntryType("x".charCodeAt(0))).toBe("file");
		expect(toEntryType("L".charCodeAt(0))).toBe("file");
	});

	it("joins the USTAR prefix in front of the name", () => {
		const header = createHeader({ name: "file.txt", prefix: "some/long/dir" });

		expect(parseHeader(header).name).toBe("some/long/dir/file.txt");
	});

	it("ignores the prefix field of GNU headers", () => {
		const header = createHeader({ name: "file.txt", prefix: "not-a-prefix" });
		header.set(encoder.encode("ustar  \0"), USTAR_MAGIC_OFFSET);

		expect(parseHeader(header).name).toBe("file.txt");
	});

	it("reads a name that fills all 100 bytes without a NUL", () => {
		const name = "n".repeat(100);
		const header = createHeader({ name });

		expect(parseHeader(header).name).toBe(name);
		expect(header[USTAR_NAME_OFFSET + 100]).not.toBe(0);
	});
});
