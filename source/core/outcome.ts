import type {
	DiagnosisTag,
	ErrorRecord,
	Outcome,
	ProcessDiagnosis,
} from "./types.js";

type DiagnosisRule = {
	tag: Exclude<ProcessDiagnosis, "unknown">;
	pattern: RegExp;
};

/**
 * Lines that mean "this post has nothing to download". The wording comes from
 * the fetch tool's extractors and changes between tool versions.
 */
export const BENIGN_PATTERNS: readonly RegExp[] = [
	/no supported media found in this post/i,
	/there(?:'s| is) no video in this post/i,
];

/** Checked top to bottom; the first rule matching any critical line wins. */
export const DIAGNOSIS_RULES: readonly DiagnosisRule[] = [
	{
		tag: "auth",
		pattern:
			/\b401\b|unauthori[sz]ed|login required|\blog ?in to\b|\bsign in\b|cookies? (?:are|is) (?:no longer valid|invalid|expired)|authentication/i,
	},
	{
		tag: "forbidden",
		pattern: /\b403\b|forbidden|access denied|not a patron|requires? (?:a )?(?:higher )?(?:tier|membership|pledge)/i,
	},
	{
		tag: "not_found",
		pattern: /\b404\b|not found|does not exist|has been removed|no longer available/i,
	},
	{
		tag: "extractor_broken",
		pattern:
			/unable to extract|unsupported url|unable to download json metadata|please report this issue|extractor ?error|keyerror|typeerror/i,
	},
];

const REMEDIATION: Record<DiagnosisTag, string> = {
	auth: "Session rejected: export a fresh cookies file from a logged-in browser and replace the configured one.",
	forbidden:
		"Access denied: check that the account behind the cookies still has access to this creator's posts.",
	not_found:
		"Target not found: the creator page or some posts were removed or renamed; check the configured name or URL.",
	extractor_broken:
		"Extraction failed: the fetch tool's extractor is likely out of date for this site; update yt-dlp and retry.",
	unknown:
		"Unrecognized failure: inspect the error log and diagnostic probe output for this creator.",
	credentials_missing:
		"Cookies file is missing or empty: export cookies from a logged-in browser session to the configured path.",
	archive_unwritable:
		"Archive ledger is not writable: check permissions on the archive file and its directory.",
	launch_failed:
		"The fetch tool could not be started: check that yt-dlp is installed and the configured path is correct.",
};

export type RecordPartition = {
	benign: ErrorRecord[];
	critical: ErrorRecord[];
};

export function isBenign(text: string): boolean {
	return BENIGN_PATTERNS.some((pattern) => pattern.test(text));
}

export function partitionRecords(
	records: readonly ErrorRecord[],
): RecordPartition {
	const benign: ErrorRecord[] = [];
	const critical: ErrorRecord[] = [];
	for (const record of records) {
		(isBenign(record.text) ? benign : critical).push(record);
	}

	return { benign, critical };
}

export function diagnose(critical: readonly ErrorRecord[]): ProcessDiagnosis {
	for (const rule of DIAGNOSIS_RULES) {
		if (critical.some((record) => rule.pattern.test(record.text))) {
			return rule.tag;
		}
	}

	return "unknown";
}

export function classifyOutcome(
	exitCode: number,
	records: readonly ErrorRecord[],
): Outcome {
	if (exitCode === 0) {
		return { kind: "success" };
	}

	const { benign, critical } = partitionRecords(records);
	if (critical.length === 0 && benign.length > 0) {
		return { kind: "degraded", benignCount: benign.length };
	}

	return { kind: "failed", diagnosis: diagnose(critical), cause: "process" };
}

export function remediationFor(tag: DiagnosisTag): string {
	return REMEDIATION[tag];
}

export function describeOutcome(outcome: Outcome): string {
	switch (outcome.kind) {
		case "success":
			return "success";
		case "degraded":
			return `degraded (${outcome.benignCount} post${outcome.benignCount === 1 ? "" : "s"} without media)`;
		case "failed":
			return `failed [${outcome.diagnosis}]`;
	}
}
