import type { ChildProcess, SpawnOptions } from "node:child_process";

export type Job = {
	creator: string;
	url: string;
	lookbackDays: number;
	extraArgs: readonly string[];
};

export type FetchSettings = {
	ytDlpPath: string;
	downloadsDir: string;
	archivePath: string;
	cookiesPath: string;
	referer: string;
	formatSelector: string;
	mergeFormat: string;
	maxItems: number;
};

export type FetchCommand = {
	command: string;
	args: string[];
};

export type OutputLine = {
	text: string;
	seq: number;
};

export type ClassifiedEvent =
	| { kind: "progress"; percent: number; throughput?: string; text: string }
	| { kind: "info"; text: string }
	| { kind: "errorOrWarning"; text: string }
	| { kind: "debug"; text: string };

export type ErrorRecord = {
	text: string;
	at: Date;
};

export type ProcessDiagnosis =
	| "auth"
	| "forbidden"
	| "not_found"
	| "extractor_broken"
	| "unknown";

export type PreconditionDiagnosis =
	| "credentials_missing"
	| "archive_unwritable"
	| "launch_failed";

export type DiagnosisTag = ProcessDiagnosis | PreconditionDiagnosis;

export type Outcome =
	| { kind: "success" }
	| { kind: "degraded"; benignCount: number }
	| { kind: "failed"; diagnosis: DiagnosisTag; cause: "precondition" | "process" };

export type ProbeFinding = "content_exists" | "no_media" | "inconclusive";

export type ProbeReport = {
	finding: ProbeFinding;
	logPath: string;
	timedOut: boolean;
};

export type SupervisorResult = {
	outcome: Outcome;
	exitCode?: number;
	errors: ErrorRecord[];
	probe?: ProbeReport;
	durationMs: number;
};

export type FileRole = "media" | "metadata" | "description" | "thumbnail" | "other";

export type FileGroup = {
	/** Identity key; the folder name is derived from it. */
	key: string;
	/** Fetch tool item id shared by every file in the group. */
	id: string;
	media?: string;
	metadata?: string;
	description?: string;
	thumbnail?: string;
	other: string[];
};

export type PipelineReport = {
	groups: number;
	itemsCreated: number;
	metadataInjected: number;
	metadataFailures: number;
	groupFailures: number;
	skippedGroups: number;
	moved: number;
	deleted: number;
};

export type SkipReason = "failed" | "no_media";

export type JobSummary = {
	creator: string;
	outcome?: Outcome;
	pipeline?: PipelineReport;
	skipped?: SkipReason;
	errorMessage?: string;
	durationMs: number;
};

export type RunSummary = {
	jobs: JobSummary[];
	succeeded: number;
	degraded: number;
	failed: number;
	errored: number;
	durationMs: number;
};

export type RunEvents = {
	jobStarted: { creator: string; index: number; total: number };
	jobFinished: { summary: JobSummary };
	runFinished: { summary: RunSummary };
};

export type SpawnFn = (
	command: string,
	args: string[],
	options: SpawnOptions,
) => ChildProcess;
