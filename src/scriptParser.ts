import type { Codebase, CodeObjectOptions, ObjectIdentity, ObjectKind } from "./model";
import { OBJECT_KINDS, createCodebase, createCodeObject, createIdentity } from "./model";
import { ScriptFormatError } from "./errors";
import logger from "./logger";

/** Every object definition in an export starts with this keyword sequence */
export const OBJECT_DELIMITER = "CREATE OR REPLACE";

/** First lines of every Denodo export script */
export const PROPERTIES_PREAMBLE = "# REQUIRES-PROPERTIES-FILE - # Do not remove this comment!\n#\n";

const HEADER_RULE = `# ${"#".repeat(39)}`;

/**
 * The comment block that opens the chapter of one object kind.
 */
export function chapterHeader(kind: ObjectKind): string {
	return `${HEADER_RULE}\n# ${kind}\n${HEADER_RULE}\n`;
}

/**
 * One object as found in a script, before it becomes a CodeObject.
 */
export interface ParsedObject {
	readonly kind: ObjectKind;
	readonly name: string;
	readonly text: string;
	readonly folder: string | undefined;
	readonly dependencies: readonly ObjectIdentity[];
}

interface Chapter {
	readonly kind: ObjectKind;
	readonly body: string;
}

/**
 * A search pattern is `prefix + name + suffix`, matched in the lower-cased code
 * of an object with whitespace runs collapsed to single spaces.
 */
interface DependencyRule {
	readonly kind: ObjectKind;
	readonly dependsOn: ObjectKind;
	readonly patterns: readonly (readonly [prefix: string, suffix: string])[];
}

const DEPENDENCY_RULES: readonly DependencyRule[] = [
	{ kind: "WRAPPERS", dependsOn: "DATASOURCES", patterns: [["datasourcename=", ""]] },
	{
		kind: "BASE VIEWS",
		dependsOn: "WRAPPERS",
		patterns: [["wrapper (jdbc ", ")"], ["wrapper (df ", ")"], ["wrapper (ldap ", ")"]],
	},
	{ kind: "VIEWS", dependsOn: "BASE VIEWS", patterns: [["from ", ""], ["join ", ""]] },
	{ kind: "VIEWS", dependsOn: "VIEWS", patterns: [["from ", ""], ["join ", ""]] },
	{ kind: "ASSOCIATIONS", dependsOn: "VIEWS", patterns: [[" ", " "]] },
];

/**
 * Parse a Denodo export script into its objects.
 *
 * Text before the first chapter header is ignored. Objects whose name cannot be
 * determined are skipped with a warning.
 * @throws ScriptFormatError if the script has content but no chapter header
 */
export function parseScript(script: string): ParsedObject[] {
	const chapters = splitChapters(script.replace(/\r\n/g, "\n"));

	const found: { kind: ObjectKind; name: string; text: string; folder: string | undefined }[] = [];

	for (const chapter of chapters) {
		const pieces = chapter.body.split(OBJECT_DELIMITER).slice(1);
		logger.debug(`Chapter ${chapter.kind}: ${pieces.length} object(s)`);

		for (const piece of pieces) {
			const text = `${(OBJECT_DELIMITER + piece).trimEnd()}\n`;
			const name = extractObjectName(chapter.kind, text);
			if (name === undefined) {
				logger.warn(`Skipping ${chapter.kind} object without a recognizable name: ${firstLine(text)}`);
				continue;
			}
			found.push({ kind: chapter.kind, name, text, folder: extractFolder(chapter.kind, text) });
		}
	}

	return found.map((object) => ({
		...object,
		dependencies: findDependencies(object, found),
	}));
}

/**
 * Parse a script and build a codebase from it.
 * @throws DuplicateIdentityError if the script defines an object twice
 */
export function loadScript(name: string, script: string, options: CodeObjectOptions = {}): Codebase {
	const objects = parseScript(script).map((parsed) => createCodeObject(parsed, options));
	return createCodebase(name, objects);
}

function splitChapters(script: string): Chapter[] {
	const starts: { kind: ObjectKind; index: number }[] = [];
	for (const kind of OBJECT_KINDS) {
		const index = script.indexOf(chapterHeader(kind));
		if (index !== -1) {
			starts.push({ kind, index });
		}
	}

	if (starts.length === 0) {
		const rest = script.startsWith(PROPERTIES_PREAMBLE) ? script.slice(PROPERTIES_PREAMBLE.length) : script;
		if (rest.trim() === "") {
			return [];
		}
		throw new ScriptFormatError("No chapter headers found; this does not look like a Denodo export script");
	}

	starts.sort((a, b) => a.index - b.index);

	return starts.map((start, i) => {
		const end = i + 1 < starts.length ? starts[i + 1].index : script.length;
		return {
			kind: start.kind,
			body: script.slice(start.index + chapterHeader(start.kind).length, end),
		};
	});
}

function firstLine(text: string): string {
	const end = text.indexOf("\n");
	return end === -1 ? text : text.slice(0, end);
}

function cleanName(word: string | undefined): string | undefined {
	if (word === undefined) return undefined;
	const name = word.replace(/[(;,]+$/, "").replace(/^"(.*)"$/, "$1");
	return name === "" ? undefined : name;
}

/**
 * Find the object name on the first line of its definition.
 * Each kind places the name differently.
 */
export function extractObjectName(kind: ObjectKind, text: string): string | undefined {
	const line = firstLine(text).trim();
	const words = line.split(/\s+/);

	switch (kind) {
		case "FOLDERS": {
			const match = /FOLDER\s+'\/?([^']*)'/i.exec(line);
			return match && match[1] !== "" ? match[1] : undefined;
		}
		case "DATABASE":
		case "TYPES":
		case "BASE VIEWS":
		case "ASSOCIATIONS":
			return cleanName(words[4]);
		case "VIEWS":
			return cleanName(words[3]?.toUpperCase() === "INTERFACE" ? words[5] : words[4]);
		default:
			// I18N MAPS, DATASOURCES, WRAPPERS and the rarer kinds end the line with the name
			return cleanName(line.replace(/\s*\($/, "").split(/\s+/).pop());
	}
}

/**
 * The Denodo folder an object lives in, lower-cased and without leading slash.
 */
export function extractFolder(kind: ObjectKind, text: string): string | undefined {
	let folder: string | undefined;

	switch (kind) {
		case "I18N MAPS":
		case "DATABASE":
		case "TYPES":
			return undefined;
		case "FOLDERS":
			folder = extractObjectName(kind, text);
			break;
		case "DATASOURCES":
			if (text.includes("DATASOURCE LDAP")) return undefined;
			folder = /FOLDER\s*=\s*'([^']*)'/i.exec(text)?.[1];
			break;
		default:
			folder = /FOLDER\s*=\s*'([^']*)'/i.exec(text)?.[1];
	}

	const normalized = folder?.replace(/^\/+/, "").toLowerCase();
	return normalized ? normalized : undefined;
}

function findDependencies(
	object: { readonly kind: ObjectKind; readonly name: string; readonly text: string },
	all: readonly { readonly kind: ObjectKind; readonly name: string }[]
): ObjectIdentity[] {
	const rules = DEPENDENCY_RULES.filter((rule) => rule.kind === object.kind);
	if (rules.length === 0) return [];

	const code = object.text.toLowerCase().replace(/\s+/g, " ");
	const dependencies: ObjectIdentity[] = [];

	for (const rule of rules) {
		for (const other of all) {
			if (other.kind !== rule.dependsOn) continue;
			const name = other.name.toLowerCase();
			if (rule.patterns.some(([prefix, suffix]) => mentions(code, prefix + name + suffix, suffix === ""))) {
				dependencies.push(createIdentity(other.kind, other.name));
			}
		}
	}

	return dependencies;
}

/**
 * Substring search; when the pattern ends with the name, the match must not
 * continue into a longer identifier.
 */
function mentions(code: string, pattern: string, nameAtEnd: boolean): boolean {
	let from = 0;
	for (;;) {
		const index = code.indexOf(pattern, from);
		if (index === -1) return false;
		if (!nameAtEnd || !/[\w$]/.test(code.charAt(index + pattern.length))) return true;
		from = index + 1;
	}
}
