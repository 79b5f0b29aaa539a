import winston from "winston";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Level named by VQL_MANAGER_LOG_LEVEL, or "warn" if unset or unknown.
 */
export function envLogLevel(): LogLevel {
	const fromEnv = process.env.VQL_MANAGER_LOG_LEVEL;
	return LOG_LEVELS.find((level) => level === fromEnv) ?? "warn";
}

const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.errors({ stack: true }),
	winston.format.splat(),
	winston.format.printf(({ timestamp, level, message, stack }) => {
		return stack
			? `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`
			: `${timestamp} [${level.toUpperCase()}]: ${message}`;
	})
);

// Everything goes to stderr; stdout is reserved for command output
const logger = winston.createLogger({
	level: envLogLevel(),
	format: logFormat,
	transports: [
		new winston.transports.Console({
			stderrLevels: [...LOG_LEVELS],
		}),
	],
});

export function setLogLevel(level: LogLevel): void {
	logger.level = level;
}

export default logger;
