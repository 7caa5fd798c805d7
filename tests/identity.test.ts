import { describe, expect, it } from "vitest";
import { classifyRole, groupFiles, identityKey, parseFileName } from "../source/postprocess/identity.js";

describe("parseFileName", () => {
	it("keeps brackets inside the title", () => {
		expect(parseFileName("Q&A [Part 2] [abc123].mp4")).toEqual({
			base: "Q&A [Part 2]",
			id: "abc123",
			ext: "mp4",
		});
	});

	it("drops the separator and keeps multi-segment extensions", () => {
		expect(parseFileName("Ep1_[111].info.json")).toEqual({ base: "Ep1", id: "111", ext: "info.json" });
	});

	it("rejects names outside the grammar", () => {
		expect(parseFileName("notes.txt")).toBeUndefined();
		expect(parseFileName("clip [].mp4")).toBeUndefined();
		expect(parseFileName("clip [abc].")).toBeUndefined();
	});

	it("falls back to the id when the title is empty", () => {
		const parsed = parseFileName("[abc].mp4");
		expect(parsed && identityKey(parsed)).toBe("abc");
	});
});

describe("classifyRole", () => {
	it.each([
		["mp4", "media"],
		["MKV", "media"],
		["m4a", "media"],
		["info.json", "metadata"],
		["description", "description"],
		["webp", "thumbnail"],
		["f137.mp4", "other"],
		["mp4.part", "other"],
		["tmp.mp4", "other"],
		["srt", "other"],
	])("classifies %s as %s", (ext, role) => {
		expect(classifyRole(ext)).toBe(role);
	});
});

describe("groupFiles", () => {
	it("groups one item's files under its title", () => {
		const groups = groupFiles([
			"Ep1 [111].mp4",
			"Ep1 [111].info.json",
			"Ep1 [111].description",
			"Ep1 [111].jpg",
			"readme.txt",
			"Ep2 [222].webm",
			"Ep2 [222].mp4",
			"Ep2 [222].f137.mp4",
		]);

		expect(groups).toEqual([
			{
				key: "Ep1",
				id: "111",
				media: "Ep1 [111].mp4",
				metadata: "Ep1 [111].info.json",
				description: "Ep1 [111].description",
				thumbnail: "Ep1 [111].jpg",
				other: [],
			},
			{
				key: "Ep2",
				id: "222",
				media: "Ep2 [222].mp4",
				other: ["Ep2 [222].f137.mp4", "Ep2 [222].webm"],
			},
		]);
	});

	it("prefers mp4 over other containers regardless of order", () => {
		expect(groupFiles(["x [1].mkv", "x [1].mp4"])).toEqual([
			{ key: "x", id: "1", media: "x [1].mp4", other: ["x [1].mkv"] },
		]);
	});

	it("keeps posts that share a title but not an id apart", () => {
		expect(
			groupFiles([
				"Weekly_Update [222].mp4",
				"Weekly_Update [111].mp4",
				"Weekly_Update [111].info.json",
				"Weekly_Update [222].jpg",
			]),
		).toEqual([
			{
				key: "Weekly_Update",
				id: "111",
				media: "Weekly_Update [111].mp4",
				metadata: "Weekly_Update [111].info.json",
				other: [],
			},
			{
				key: "Weekly_Update",
				id: "222",
				media: "Weekly_Update [222].mp4",
				thumbnail: "Weekly_Update [222].jpg",
				other: [],
			},
		]);
	});

	it("returns nothing for names without an id", () => {
		expect(groupFiles(["video.mp4", "thumbnail.jpg"])).toEqual([]);
	});
});
