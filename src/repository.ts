import * as fs from "fs";
import * as path from "path";
import type { Codebase, CodeObject, CodeObjectOptions, ObjectKind } from "./model";
import { OBJECT_KINDS } from "./model";
import { orderByDependency } from "./dependencies";
import { PROPERTIES_PREAMBLE, chapterHeader, loadScript } from "./scriptParser";
import { RepositoryError } from "./errors";
import logger from "./logger";

/** Lists the code files of one kind directory in execution order */
export const PART_LOG_FILE_NAME = "part.log";

export const CODE_FILE_EXTENSION = ".vql";

export interface WriteRepositoryOptions {
	/** Replace the kind directories of an existing repository */
	readonly force?: boolean;
}

export interface ReadRepositoryResult {
	readonly codebase: Codebase;
	/** Missing part.log or code files that were skipped */
	readonly warnings: readonly string[];
}

/**
 * File name of an object within its kind directory.
 * Slashes in the name become underscores.
 */
export function codeFileName(object: CodeObject): string {
	return object.displayName.replace(/[/\\]/g, "_") + CODE_FILE_EXTENSION;
}

/**
 * Check whether a directory looks like a repository (has at least one kind directory).
 */
export function isRepository(dir: string): boolean {
	return kindDirectories(dir).length > 0;
}

/**
 * Write a codebase as a repository: one directory per kind, one file per object,
 * and a part.log per directory.
 * @throws RepositoryError if the target is not empty (without force) or two objects map to one file
 */
export function writeRepository(codebase: Codebase, dir: string, options: WriteRepositoryOptions = {}): void {
	const root = path.resolve(dir);
	const plan = planRepository(codebase);

	if (fs.existsSync(root)) {
		if (!fs.statSync(root).isDirectory()) {
			throw new RepositoryError(`${root} exists and is not a directory`);
		}
		if (fs.readdirSync(root).length > 0) {
			if (!options.force) {
				throw new RepositoryError(`${root} is not empty; use force to overwrite the repository`);
			}
			for (const kind of kindDirectories(root)) {
				fs.rmSync(path.join(root, kind), { recursive: true, force: true });
			}
		}
	}

	for (const [kind, objects] of plan) {
		const kindDir = path.join(root, kind);
		fs.mkdirSync(kindDir, { recursive: true });
		for (const object of objects) {
			fs.writeFileSync(path.join(kindDir, codeFileName(object)), object.text);
		}

		const partLog = objects.map((o) => `${kind}/${codeFileName(o)}`).join("\n");
		fs.writeFileSync(path.join(kindDir, PART_LOG_FILE_NAME), partLog);
		logger.debug(`Wrote ${objects.length} ${kind} object(s) to ${kindDir}`);
	}

	logger.info(`Wrote repository with ${codebase.size} object(s) to ${root}`);
}

/**
 * Objects per kind directory, in part.log order. Nothing is touched on disk
 * until every kind is known to map onto distinct file names.
 */
function planRepository(codebase: Codebase): Map<ObjectKind, readonly CodeObject[]> {
	const plan = new Map<ObjectKind, readonly CodeObject[]>();

	for (const kind of OBJECT_KINDS) {
		const objects = orderByDependency(codebase.objects().filter((o) => o.identity.kind === kind));
		if (objects.length === 0) continue;

		const files = new Map<string, CodeObject>();
		for (const object of objects) {
			const fileName = codeFileName(object);
			const key = fileName.toLowerCase();
			const clash = files.get(key);
			if (clash) {
				throw new RepositoryError(
					`${kind} objects "${clash.displayName}" and "${object.displayName}" would both be stored as ${fileName}`
				);
			}
			files.set(key, object);
		}
		plan.set(kind, objects);
	}

	return plan;
}

/**
 * Read a repository back into a codebase.
 * Missing part.log and code files are skipped and reported as warnings.
 * @throws RepositoryError if the directory contains no kind directory
 */
export function readRepository(dir: string, options: CodeObjectOptions = {}): ReadRepositoryResult {
	const root = path.resolve(dir);
	const kinds = kindDirectories(root);

	if (kinds.length === 0) {
		throw new RepositoryError(`No repository found in ${root}: none of its directories is named after an object kind`);
	}

	const warnings: string[] = [];
	let script = PROPERTIES_PREAMBLE;

	for (const kind of kinds) {
		script += chapterHeader(kind);

		const partLogPath = path.join(root, kind, PART_LOG_FILE_NAME);
		if (!fs.existsSync(partLogPath)) {
			warnings.push(`${partLogPath} not found`);
			continue;
		}

		const entries = fs.readFileSync(partLogPath, "utf-8")
			.split(/\r?\n/)
			.map((line) => line.trim())
			.filter((line) => line !== "");

		for (const entry of entries) {
			// Older repositories list absolute paths
			const codePath = path.isAbsolute(entry) ? entry : path.join(root, entry);
			if (!fs.existsSync(codePath)) {
				warnings.push(`${codePath} not found`);
				continue;
			}
			script += `${fs.readFileSync(codePath, "utf-8").trimEnd()}\n\n`;
		}
	}

	for (const warning of warnings) {
		logger.warn(`Repository ${root}: ${warning}`);
	}

	const codebase = loadScript(path.basename(root), script, options);
	logger.info(`Read repository with ${codebase.size} object(s) from ${root}`);

	return { codebase, warnings };
}

/**
 * Kind directories present in `dir`, in execution order.
 */
function kindDirectories(dir: string): ObjectKind[] {
	if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
		return [];
	}
	const entries = new Set(
		fs.readdirSync(dir, { withFileTypes: true })
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name)
	);
	return OBJECT_KINDS.filter((kind) => entries.has(kind));
}
