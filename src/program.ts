import { Command, CommanderError, Option } from "commander";
import type { Codebase, Normalization, ObjectIdentity } from "./model";
import { formatIdentity, parseIdentity } from "./model";
import { hasChanges } from "./diff";
import { dependenciesOf, dependentsOf } from "./dependencies";
import { groupByFolder } from "./folderView";
import { formatReport, reportToJson } from "./reportFormatter";
import { VqlManager } from "./vqlManager";
import { UnknownObjectError, VqlManagerError } from "./errors";
import logger, { LOG_LEVELS, type LogLevel } from "./logger";

/**
 * Where the program writes its output and exit status.
 */
export interface ProgramIO {
	out(text: string): void;
	err(text: string): void;
	setExitCode(code: number): void;
}

const consoleIO: ProgramIO = {
	out: (text) => console.log(text),
	err: (text) => console.error(text),
	setExitCode: (code) => {
		process.exitCode = code;
	},
};

interface GlobalOptions {
	config?: string;
	normalize?: Normalization;
	logLevel?: LogLevel;
}

/** Exit code of `compare` when the sources differ */
export const EXIT_CHANGES = 1;
/** Exit code when a command fails */
export const EXIT_ERROR = 2;

function toIdentity(text: string): ObjectIdentity {
	const identity = parseIdentity(text);
	if (!identity) {
		throw new VqlManagerError(`Invalid object "${text}"; expected KIND:name, e.g. "VIEWS:customer"`, "INVALID_OBJECT");
	}
	return identity;
}

function requireObject(codebase: Codebase, identity: ObjectIdentity): void {
	if (!codebase.has(identity)) {
		throw new UnknownObjectError(identity, codebase.name);
	}
}

export function createProgram(io: ProgramIO = consoleIO): Command {
	const program = new Command();

	program
		.name("vql-manager")
		.description("Split, merge and compare Denodo VQL export scripts")
		.version("1.0.0")
		.option("--config <file>", "Configuration file (default: ./vql-manager.json if present)")
		.addOption(new Option("--normalize <mode>", "Content comparison mode").choices(["none", "whitespace"]))
		.addOption(new Option("--log-level <level>", "Log level").choices([...LOG_LEVELS]))
		.exitOverride()
		.configureOutput({
			writeOut: (text) => io.out(text.trimEnd()),
			writeErr: (text) => io.err(text.trimEnd()),
		});

	function manager(): VqlManager {
		const globals = program.opts<GlobalOptions>();
		return VqlManager.fromConfig(globals.config, {
			normalize: globals.normalize,
			logLevel: globals.logLevel,
		});
	}

	function run(action: () => void): void {
		try {
			action();
		} catch (error) {
			if (error instanceof VqlManagerError) {
				logger.debug(error.stack ?? error.message);
				io.err(`Error: ${error.message}`);
				io.setExitCode(EXIT_ERROR);
				return;
			}
			throw error;
		}
	}

	program
		.command("split")
		.description("Split an export script into a repository (one file per object)")
		.argument("<script>", "Export script (.vql) or repository")
		.requiredOption("-o, --output <dir>", "Repository directory to write")
		.option("-f, --force", "Replace an existing repository")
		.action((script: string, options: { output: string; force?: boolean }) => run(() => {
			const codebase = manager().split(script, options.output, { force: options.force });
			io.out(`Split ${codebase.size} object(s) into ${options.output}`);
		}));

	program
		.command("merge")
		.description("Combine a repository into a single export script")
		.argument("<repository>", "Repository directory or export script")
		.requiredOption("-o, --output <file>", "Script file to write")
		.action((repository: string, options: { output: string }) => run(() => {
			const codebase = manager().merge(repository, options.output);
			io.out(`Merged ${codebase.size} object(s) into ${options.output}`);
		}));

	program
		.command("compare")
		.description("Show objects added, removed and changed between two code bases")
		.argument("<old>", "Old script or repository")
		.argument("<new>", "New script or repository")
		.option("--json", "Output the report as JSON")
		.option("--code", "Show old and new code of changed objects")
		.action((oldSource: string, newSource: string, options: { json?: boolean; code?: boolean }) => run(() => {
			const report = manager().compare(oldSource, newSource);
			if (options.json) {
				io.out(JSON.stringify(reportToJson(report), null, 2));
			} else {
				io.out(formatReport(report, { showCode: options.code }));
			}
			if (hasChanges(report)) {
				io.setExitCode(EXIT_CHANGES);
			}
		}));

	program
		.command("list")
		.description("List the objects of a code base")
		.argument("<source>", "Script or repository")
		.option("--folders", "Group objects by Denodo folder")
		.action((source: string, options: { folders?: boolean }) => run(() => {
			const codebase = manager().load(source);
			if (options.folders) {
				for (const [folder, objects] of groupByFolder(codebase)) {
					io.out(folder);
					for (const object of objects) {
						io.out(`  ${formatIdentity(object.identity)}`);
					}
				}
			} else {
				for (const object of codebase.objects()) {
					io.out(formatIdentity(object.identity));
				}
			}
			io.out(`Total: ${codebase.size} object(s)`);
		}));

	program
		.command("dependents")
		.description("List objects that depend on an object, directly or indirectly")
		.argument("<source>", "Script or repository")
		.argument("<object>", "Object as KIND:name")
		.action((source: string, object: string) => run(() => {
			const identity = toIdentity(object);
			const codebase = manager().load(source);
			requireObject(codebase, identity);
			const dependents = dependentsOf(codebase, identity);
			if (dependents.length === 0) {
				io.out("No dependents.");
			}
			for (const dependent of dependents) {
				io.out(formatIdentity(dependent));
			}
		}));

	program
		.command("dependencies")
		.description("List objects an object depends on, directly or indirectly")
		.argument("<source>", "Script or repository")
		.argument("<object>", "Object as KIND:name")
		.action((source: string, object: string) => run(() => {
			const identity = toIdentity(object);
			const codebase = manager().load(source);
			requireObject(codebase, identity);
			const dependencies = dependenciesOf(codebase, identity);
			if (dependencies.length === 0) {
				io.out("No dependencies.");
			}
			for (const dependency of dependencies) {
				io.out(formatIdentity(dependency));
			}
		}));

	program
		.command("extract")
		.description("Write objects and everything they depend on to a new export script")
		.argument("<source>", "Script or repository")
		.argument("<objects...>", "Objects as KIND:name")
		.requiredOption("-o, --output <file>", "Script file to write")
		.action((source: string, objects: string[], options: { output: string }) => run(() => {
			const identities = objects.map(toIdentity);
			const selection = manager().extract(source, identities, options.output);
			io.out(`Extracted ${selection.size} object(s) into ${options.output}`);
		}));

	return program;
}

/**
 * Parse and run one command line. Usage errors reported by commander exit with
 * EXIT_ERROR so they cannot be mistaken for EXIT_CHANGES.
 */
export function runProgram(args: string[], io: ProgramIO = consoleIO): void {
	const program = createProgram(io);
	try {
		program.parse(args, { from: "user" });
	} catch (error) {
		if (error instanceof CommanderError) {
			io.setExitCode(error.exitCode === 0 ? 0 : EXIT_ERROR);
			return;
		}
		throw error;
	}
}
