import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS, envLogLevel, type LogLevel } from "./logger";
import type { Normalization } from "./model";

export const CONFIG_FILE_NAME = "vql-manager.json";

const ConfigFileSchema = z.object({
	normalize: z.enum(["none", "whitespace"]).optional(),
	logLevel: z.enum(LOG_LEVELS).optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface VqlManagerConfig {
	readonly normalize: Normalization;
	readonly logLevel: LogLevel;
}

export const DEFAULT_NORMALIZATION: Normalization = "none";

/**
 * Validate parsed JSON against the config file schema.
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(value: unknown, source = CONFIG_FILE_NAME): ConfigFile {
	const result = ConfigFileSchema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
	}
	return result.data;
}

/**
 * Load the configuration file.
 * An explicit path must exist; without one, `vql-manager.json` in `cwd` is used if present.
 */
export function loadConfigFile(configPath?: string, cwd = process.cwd()): ConfigFile {
	const filePath = configPath
		? path.resolve(cwd, configPath)
		: path.join(cwd, CONFIG_FILE_NAME);

	if (!fs.existsSync(filePath)) {
		if (configPath) {
			throw new ConfigError(`Configuration file not found: ${filePath}`);
		}
		return {};
	}

	let json: unknown;
	try {
		json = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		if (error instanceof SyntaxError) {
			throw new ConfigError(`Configuration file ${filePath} is not valid JSON: ${error.message}`);
		}
		throw error;
	}

	return parseConfig(json, filePath);
}

/**
 * Merge defaults, file values and overrides (later wins).
 * The default log level comes from VQL_MANAGER_LOG_LEVEL.
 */
export function resolveConfig(
	file: ConfigFile,
	overrides: Partial<VqlManagerConfig> = {}
): VqlManagerConfig {
	return {
		normalize: overrides.normalize ?? file.normalize ?? DEFAULT_NORMALIZATION,
		logLevel: overrides.logLevel ?? file.logLevel ?? envLogLevel(),
	};
}
