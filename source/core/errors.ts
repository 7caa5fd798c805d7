export class CreatorSyncError extends Error {
	readonly exitCode: 1 | 2 | 3;

	constructor(message: string, exitCode: 1 | 2 | 3, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}

export class InvalidInputError extends CreatorSyncError {
	constructor(message: string) {
		super(message, 2);
	}
}

export class ConfigError extends CreatorSyncError {
	readonly configPath: string;

	constructor(message: string, configPath: string, options?: ErrorOptions) {
		super(message, 2, options);
		this.configPath = configPath;
	}
}

export class DependencyError extends CreatorSyncError {
	constructor(message: string) {
		super(message, 3);
	}
}

/**
 * Raised by a transcoder when the metadata pass did not produce a usable file.
 * The pipeline catches it per group; it never reaches the CLI.
 */
export class MetadataInjectionError extends CreatorSyncError {
	readonly mediaPath: string;

	constructor(message: string, mediaPath: string, options?: ErrorOptions) {
		super(message, 1, options);
		this.mediaPath = mediaPath;
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return String(error);
}

export function toExitCode(error: unknown): 1 | 2 | 3 {
	if (error instanceof CreatorSyncError) {
		return error.exitCode;
	}

	return 1;
}
