import * as fs from "fs";
import * as path from "path";
import type { ChangeReport, Codebase, ObjectIdentity } from "./model";
import type { VqlManagerConfig, ConfigFile } from "./config";
import { loadConfigFile, resolveConfig } from "./config";
import { compare } from "./diff";
import { selectWithDependencies } from "./dependencies";
import { loadScript } from "./scriptParser";
import { serializeScript } from "./scriptWriter";
import { readRepository, writeRepository, type WriteRepositoryOptions } from "./repository";
import { SourceNotFoundError, UnknownObjectError } from "./errors";
import logger, { setLogLevel } from "./logger";

/**
 * High-level operations on export scripts and repositories.
 * Coordinates parsing, repository I/O and comparison.
 */
export class VqlManager {
	constructor(private readonly _config: VqlManagerConfig) { }

	/**
	 * Create a VqlManager from the configuration file (if any) and overrides.
	 * Applies the configured log level.
	 */
	static fromConfig(configPath?: string, overrides: Partial<VqlManagerConfig> = {}, cwd?: string): VqlManager {
		const file: ConfigFile = loadConfigFile(configPath, cwd);
		const config = resolveConfig(file, overrides);
		setLogLevel(config.logLevel);
		logger.debug(`Configuration: ${JSON.stringify(config)}`);
		return new VqlManager(config);
	}

	get config(): VqlManagerConfig {
		return this._config;
	}

	/**
	 * Load a codebase from a script file or a repository directory.
	 * @throws SourceNotFoundError if nothing exists at `source`
	 */
	load(source: string): Codebase {
		const resolved = path.resolve(source);
		if (!fs.existsSync(resolved)) {
			throw new SourceNotFoundError(resolved);
		}

		if (fs.statSync(resolved).isDirectory()) {
			return readRepository(resolved, this._options()).codebase;
		}

		logger.info(`Loading script ${resolved}`);
		const script = fs.readFileSync(resolved, "utf-8");
		return loadScript(path.basename(resolved), script, this._options());
	}

	/**
	 * Split a script (or re-layout a repository) into a repository directory.
	 */
	split(source: string, outputDir: string, options: WriteRepositoryOptions = {}): Codebase {
		const codebase = this.load(source);
		writeRepository(codebase, outputDir, options);
		return codebase;
	}

	/**
	 * Combine a repository (or normalize a script) into a single script file.
	 */
	merge(source: string, outputFile: string): Codebase {
		const codebase = this.load(source);
		this._writeScript(codebase, outputFile);
		return codebase;
	}

	compare(oldSource: string, newSource: string): ChangeReport {
		return compare(this.load(oldSource), this.load(newSource));
	}

	/**
	 * Write the given objects and everything they depend on as a script.
	 * @throws UnknownObjectError if an identity is not in the source
	 */
	extract(source: string, identities: readonly ObjectIdentity[], outputFile: string): Codebase {
		const codebase = this.load(source);
		for (const identity of identities) {
			if (!codebase.has(identity)) {
				throw new UnknownObjectError(identity, codebase.name);
			}
		}

		const selection = selectWithDependencies(codebase, identities);
		this._writeScript(selection, outputFile);
		return selection;
	}

	private _writeScript(codebase: Codebase, outputFile: string): void {
		const outputPath = path.resolve(outputFile);
		fs.mkdirSync(path.dirname(outputPath), { recursive: true });
		fs.writeFileSync(outputPath, serializeScript(codebase));
		logger.info(`Wrote ${codebase.size} object(s) to ${outputPath}`);
	}

	private _options() {
		return { normalize: this._config.normalize };
	}
}
