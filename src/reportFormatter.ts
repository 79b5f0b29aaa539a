import type { ChangeReport, ObjectIdentity } from "./model";
import { formatIdentity } from "./model";
import { hasChanges } from "./diff";

export interface FormatOptions {
	/** Include the old and new code of changed objects */
	readonly showCode?: boolean;
}

/**
 * Plain JSON form of a change report.
 */
export interface ChangeReportJson {
	old: string;
	new: string;
	added: string[];
	removed: string[];
	changed: { object: string; oldText: string; newText: string }[];
	cascade: string[];
	unchanged: number;
}

/**
 * Format a change report for the terminal.
 */
export function formatReport(report: ChangeReport, options: FormatOptions = {}): string {
	const lines: string[] = [];

	lines.push(`Comparing ${report.oldName} with ${report.newName}`);

	if (!hasChanges(report)) {
		lines.push("No changes.");
		return lines.join("\n");
	}

	const section = (label: string, identities: readonly ObjectIdentity[]) => {
		for (const identity of identities) {
			lines.push(`  ${label.padEnd(8)} ${formatIdentity(identity)}`);
		}
	};

	section("ADDED", report.added);
	section("REMOVED", report.removed);

	for (const change of report.changed) {
		lines.push(`  ${"CHANGED".padEnd(8)} ${formatIdentity(change.identity)}`);
		if (options.showCode) {
			lines.push(...indent("- ", change.oldText));
			lines.push(...indent("+ ", change.newText));
		}
	}

	section("CASCADE", report.cascade);

	lines.push(
		`Total: ${report.added.length} added, ${report.removed.length} removed, ` +
		`${report.changed.length} changed, ${report.cascade.length} cascaded, ${report.unchangedCount} unchanged`
	);

	return lines.join("\n");
}

export function reportToJson(report: ChangeReport): ChangeReportJson {
	return {
		old: report.oldName,
		new: report.newName,
		added: report.added.map(formatIdentity),
		removed: report.removed.map(formatIdentity),
		changed: report.changed.map((change) => ({
			object: formatIdentity(change.identity),
			oldText: change.oldText,
			newText: change.newText,
		})),
		cascade: report.cascade.map(formatIdentity),
		unchanged: report.unchangedCount,
	};
}

function indent(prefix: string, text: string): string[] {
	return text.trimEnd().split("\n").map((line) => `      ${prefix}${line}`);
}
