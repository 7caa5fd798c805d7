import { describe, expect, it } from "vitest";
import {
	classifyOutcome,
	describeOutcome,
	diagnose,
	partitionRecords,
	remediationFor,
} from "../source/core/outcome.js";
import type { ErrorRecord } from "../source/core/types.js";

const at = new Date("2024-05-01T10:00:00Z");

function records(...texts: string[]): ErrorRecord[] {
	return texts.map((text) => ({ text, at }));
}

const BENIGN = "ERROR: [patreon] 101: No supported media found in this post";

describe("classifyOutcome", () => {
	it("is a success whenever the tool exits cleanly", () => {
		expect(classifyOutcome(0, records("WARNING: something odd"))).toEqual({ kind: "success" });
	});

	it("degrades when every error is a known benign one", () => {
		expect(
			classifyOutcome(
				1,
				records(BENIGN, "ERROR: [patreon] 102: No supported media found in this post", BENIGN),
			),
		).toEqual({ kind: "degraded", benignCount: 3 });
	});

	it("fails when a critical line sits among benign ones", () => {
		expect(
			classifyOutcome(1, records(BENIGN, "ERROR: [patreon] alice: HTTP Error 401: Unauthorized")),
		).toEqual({ kind: "failed", diagnosis: "auth", cause: "process" });
	});

	it("treats warnings as critical", () => {
		expect(classifyOutcome(1, records(BENIGN, "WARNING: [patreon] retrying"))).toEqual({
			kind: "failed",
			diagnosis: "unknown",
			cause: "process",
		});
	});

	it("fails with an unknown diagnosis when nothing was reported", () => {
		expect(classifyOutcome(2, [])).toEqual({ kind: "failed", diagnosis: "unknown", cause: "process" });
	});
});

describe("diagnose", () => {
	it.each([
		["ERROR: HTTP Error 403: Forbidden", "forbidden"],
		["ERROR: [patreon] You are not a patron of this creator", "forbidden"],
		["ERROR: HTTP Error 404: Not Found", "not_found"],
		["ERROR: [patreon] Unable to extract campaign id; please report this issue", "extractor_broken"],
		["ERROR: [patreon] Login required to view this post", "auth"],
		["ERROR: something nobody has seen before", "unknown"],
	])("maps %j to %s", (text, tag) => {
		expect(diagnose(records(text))).toBe(tag);
	});

	it("picks the earlier rule when several match", () => {
		expect(diagnose(records("ERROR: HTTP Error 403: Forbidden", "ERROR: login required"))).toBe("auth");
	});
});

describe("partitionRecords", () => {
	it("splits benign from critical records", () => {
		const split = partitionRecords(records(BENIGN, "ERROR: boom"));
		expect(split.benign.map((record) => record.text)).toEqual([BENIGN]);
		expect(split.critical.map((record) => record.text)).toEqual(["ERROR: boom"]);
	});
});

describe("describeOutcome", () => {
	it("summarises each kind", () => {
		expect(describeOutcome({ kind: "success" })).toBe("success");
		expect(describeOutcome({ kind: "degraded", benignCount: 1 })).toBe(
			"degraded (1 post without media)",
		);
		expect(describeOutcome({ kind: "degraded", benignCount: 4 })).toBe(
			"degraded (4 posts without media)",
		);
		expect(describeOutcome({ kind: "failed", diagnosis: "not_found", cause: "process" })).toBe(
			"failed [not_found]",
		);
	});

	it("has a remediation hint for every tag", () => {
		expect(remediationFor("credentials_missing")).toBe(
			"Cookies file is missing or empty: export cookies from a logged-in browser session to the configured path.",
		);
	});
});
