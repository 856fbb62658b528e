import { describe, expect, it } from "vitest";
import { createPfsLayout } from "../../src/web";
import { compareNames } from "../../src/web/utils";

describe("layout", () => {
	it("sorts entries by name and places payloads after the header", () => {
		const layout = createPfsLayout([
			{ name: "b.bin", size: 3 },
			{ name: "a.bin", size: 2 },
		]);

		expect(layout.entries.map((e) => e.info.name)).toEqual(["a.bin", "b.bin"]);
		expect(layout.nameTableSize).toBe(12);
		expect(layout.padding).toBe(4);
		expect(layout.headerSize).toBe(80);
		expect(layout.payloadSize).toBe(5);

		expect(layout.entries[0].dataOffset).toBe(80);
		expect(layout.entries[0].nameOffset).toBe(0);
		expect(layout.entries[1].dataOffset).toBe(82);
		expect(layout.entries[1].nameOffset).toBe(6);
	});

	it("does not reorder the caller's array", () => {
		const input = [
			{ name: "z", size: 1 },
			{ name: "a", size: 1 },
		];

		createPfsLayout(input);

		expect(input.map((e) => e.name)).toEqual(["z", "a"]);
	});

	it("assigns contiguous data offsets", () => {
		const sizes = [10, 0, 7, 1024, 3];
		const layout = createPfsLayout(
			sizes.map((size, i) => ({ name: `file-${i}.nca`, size })),
		);

		expect(layout.entries[0].dataOffset).toBe(layout.headerSize);
		for (let i = 1; i < layout.entries.length; i++) {
			const previous = layout.entries[i - 1];
			expect(layout.entries[i].dataOffset).toBe(
				previous.dataOffset + previous.info.size,
			);
		}
	});

	it("always pads the header to a multiple of 16", () => {
		for (let length = 1; length <= 20; length++) {
			const layout = createPfsLayout([{ name: "x".repeat(length), size: 1 }]);

			expect(layout.headerSize % 16).toBe(0);
			expect(layout.padding).toBeLessThan(16);
			expect(layout.headerSize).toBe(16 + 24 + length + 1 + layout.padding);
		}
	});

	it("needs no padding when the header is already aligned", () => {
		// 16 + 24 + "abcdefg\0" (8) = 48
		const layout = createPfsLayout([{ name: "abcdefg", size: 4 }]);

		expect(layout.padding).toBe(0);
		expect(layout.headerSize).toBe(48);
	});

	it("measures names in UTF-8 bytes", () => {
		// "é" is two bytes in UTF-8.
		const layout = createPfsLayout([
			{ name: "é", size: 1 },
			{ name: "a", size: 1 },
		]);

		expect(layout.nameTableSize).toBe(5);
		expect(layout.entries[1].nameOffset).toBe(2);
	});

	it("produces a bare prologue for zero entries", () => {
		const layout = createPfsLayout([]);

		expect(layout.entries).toEqual([]);
		expect(layout.headerSize).toBe(16);
		expect(layout.nameTableSize).toBe(0);
		expect(layout.padding).toBe(0);
	});

	it("carries extra entry properties through", () => {
		const layout = createPfsLayout([
			{ name: "a", size: 1, sourcePath: "/tmp/a" },
		]);

		expect(layout.entries[0].info.sourcePath).toBe("/tmp/a");
	});
});

describe("compareNames", () => {
	it("orders by bytes rather than by locale", () => {
		expect(["b", "B", "a", "_"].sort(compareNames)).toEqual([
			"B",
			"_",
			"a",
			"b",
		]);
	});

	it("orders a prefix before the longer name", () => {
		expect(compareNames("abc", "abcd")).toBeLessThan(0);
		expect(compareNames("abcd", "abc")).toBeGreaterThan(0);
		expect(compareNames("abc", "abc")).toBe(0);
	});
});
