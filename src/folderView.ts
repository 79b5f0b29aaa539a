import type { Codebase, CodeObject } from "./model";

/** Folder used for objects that do not live in a Denodo folder */
export const ROOT_FOLDER = "/";

/**
 * Group objects by the Denodo folder they live in.
 * Folders are sorted by path, objects keep the codebase order (kind, then name).
 */
export function groupByFolder(codebase: Codebase): ReadonlyMap<string, readonly CodeObject[]> {
	const groups = new Map<string, CodeObject[]>();

	for (const object of codebase.objects()) {
		const folder = object.folder === undefined ? ROOT_FOLDER : `/${object.folder}`;
		const existing = groups.get(folder) ?? [];
		existing.push(object);
		groups.set(folder, existing);
	}

	const folders = [...groups.keys()].sort();
	return new Map(folders.map((folder) => [folder, groups.get(folder) ?? []]));
}
