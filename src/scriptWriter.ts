import type { Codebase } from "./model";
import { OBJECT_KINDS } from "./model";
import { orderByDependency } from "./dependencies";
import { PROPERTIES_PREAMBLE, chapterHeader } from "./scriptParser";

/**
 * Serialize a codebase as a single Denodo export script.
 * Every chapter header is written, in execution order; objects within a chapter
 * follow their dependencies.
 */
export function serializeScript(codebase: Codebase): string {
	const chapters = OBJECT_KINDS.map((kind) => {
		const objects = codebase.objects().filter((o) => o.identity.kind === kind);
		const code = orderByDependency(objects).map((o) => o.text);
		return chapterHeader(kind) + code.join("\n");
	});

	return PROPERTIES_PREAMBLE + chapters.join("\n");
}
