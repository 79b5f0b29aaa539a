import type { ObjectIdentity } from "./model";

/**
 * Base class for all errors raised by vql-manager itself.
 */
export class VqlManagerError extends Error {
	constructor(
		message: string,
		readonly code: string
	) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Two objects with the same (kind, name) were given to one codebase.
 */
export class DuplicateIdentityError extends VqlManagerError {
	constructor(readonly identity: ObjectIdentity) {
		super(`Duplicate object ${identity.kind}:${identity.name}`, "DUPLICATE_IDENTITY");
	}
}

export class ScriptFormatError extends VqlManagerError {
	constructor(message: string) {
		super(message, "SCRIPT_FORMAT");
	}
}

export class RepositoryError extends VqlManagerError {
	constructor(message: string) {
		super(message, "REPOSITORY");
	}
}

export class ConfigError extends VqlManagerError {
	constructor(message: string) {
		super(message, "CONFIG");
	}
}

/**
 * A command named an object that the codebase does not contain.
 */
export class UnknownObjectError extends VqlManagerError {
	constructor(readonly identity: ObjectIdentity, codebaseName: string) {
		super(`${codebaseName} has no object ${identity.kind}:${identity.name}`, "UNKNOWN_OBJECT");
	}
}

export class SourceNotFoundError extends VqlManagerError {
	constructor(source: string) {
		super(`No script file or repository at ${source}`, "SOURCE_NOT_FOUND");
	}
}
