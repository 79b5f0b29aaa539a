import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
	PART_LOG_FILE_NAME,
	codeFileName,
	isRepository,
	readRepository,
	writeRepository,
} from "./repository";
import { loadScript } from "./scriptParser";
import { compare, hasChanges } from "./diff";
import { createCodeObject, createCodebase, formatIdentity } from "./model";
import { RepositoryError } from "./errors";

const salesScript = fs.readFileSync(path.resolve(process.cwd(), "src/__fixtures__/sales.vql"), "utf-8");

describe("repository", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "vql-repo-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	describe("writeRepository", () => {
		test("writes one file per object and a part.log per kind", () => {
			const repo = path.join(tempDir, "repo");

			writeRepository(loadScript("sales.vql", salesScript), repo);

			expect(fs.readdirSync(repo).sort()).toEqual([
				"ASSOCIATIONS",
				"BASE VIEWS",
				"DATABASE",
				"DATASOURCES",
				"FOLDERS",
				"VIEWS",
				"WRAPPERS",
			]);
			expect(fs.readFileSync(path.join(repo, "VIEWS", PART_LOG_FILE_NAME), "utf-8")).toBe(
				"VIEWS/iv_customer.vql\nVIEWS/v_customer.vql\nVIEWS/v_customer_10.vql\nVIEWS/v_report.vql"
			);
			expect(fs.readFileSync(path.join(repo, "VIEWS", "v_customer.vql"), "utf-8")).toBe(
				"CREATE OR REPLACE VIEW v_customer FOLDER = '/02_views' AS SELECT * FROM bv_customer;\n"
			);
		});

		test("refuses a non-empty directory without force", () => {
			fs.writeFileSync(path.join(tempDir, "notes.txt"), "keep");

			expect(() => writeRepository(loadScript("sales.vql", salesScript), tempDir)).toThrow(RepositoryError);
		});

		test("force replaces the previous repository", () => {
			writeRepository(loadScript("sales.vql", salesScript), tempDir);
			const smaller = createCodebase("small", [
				createCodeObject({ kind: "VIEWS", name: "only", text: "CREATE OR REPLACE VIEW only AS SELECT 1;\n" }),
			]);

			writeRepository(smaller, tempDir, { force: true });

			expect(fs.readdirSync(tempDir)).toEqual(["VIEWS"]);
			expect(fs.readdirSync(path.join(tempDir, "VIEWS")).sort()).toEqual(["only.vql", "part.log"]);
		});

		test("slashes in names become underscores", () => {
			const folder = createCodeObject({ kind: "FOLDERS", name: "01_sources/crm", text: "CREATE OR REPLACE FOLDER '/01_sources/crm';\n" });

			expect(codeFileName(folder)).toBe("01_sources_crm.vql");
		});

		test("fails when two objects map to the same file", () => {
			const codebase = createCodebase("clash", [
				createCodeObject({ kind: "FOLDERS", name: "a/b", text: "CREATE OR REPLACE FOLDER '/a/b';\n" }),
				createCodeObject({ kind: "FOLDERS", name: "a_b", text: "CREATE OR REPLACE FOLDER '/a_b';\n" }),
			]);

			expect(() => writeRepository(codebase, path.join(tempDir, "repo"))).toThrow(RepositoryError);
		});

		test("a clashing forced write leaves the previous repository intact", () => {
			writeRepository(loadScript("sales.vql", salesScript), tempDir);
			const before = fs.readdirSync(tempDir).sort();
			const clash = createCodebase("clash", [
				createCodeObject({ kind: "DATASOURCES", name: "ds", text: "CREATE OR REPLACE DATASOURCE JDBC ds;\n" }),
				createCodeObject({ kind: "VIEWS", name: "a/b", text: "CREATE OR REPLACE VIEW a/b AS SELECT 1;\n" }),
				createCodeObject({ kind: "VIEWS", name: "a_b", text: "CREATE OR REPLACE VIEW a_b AS SELECT 1;\n" }),
			]);

			expect(() => writeRepository(clash, tempDir, { force: true })).toThrow(RepositoryError);
			expect(fs.readdirSync(tempDir).sort()).toEqual(before);
			expect(fs.readFileSync(path.join(tempDir, "DATASOURCES", PART_LOG_FILE_NAME), "utf-8")).toBe("DATASOURCES/ds_crm.vql");
			expect(hasChanges(compare(loadScript("sales.vql", salesScript), readRepository(tempDir).codebase))).toBe(false);
		});
	});

	describe("readRepository", () => {
		test("reads back what was written", () => {
			const original = loadScript("sales.vql", salesScript);
			const repo = path.join(tempDir, "sales");
			writeRepository(original, repo);

			const { codebase, warnings } = readRepository(repo);

			expect(warnings).toEqual([]);
			expect(codebase.name).toBe("sales");
			expect(hasChanges(compare(original, codebase))).toBe(false);
		});

		test("skips missing code files with a warning", () => {
			const repo = path.join(tempDir, "sales");
			writeRepository(loadScript("sales.vql", salesScript), repo);
			const missing = path.join(repo, "VIEWS", "v_report.vql");
			fs.rmSync(missing);

			const { codebase, warnings } = readRepository(repo);

			expect(warnings).toEqual([`${missing} not found`]);
			expect(codebase.size).toBe(10);
			expect(codebase.identities().map(formatIdentity)).not.toContain("VIEWS:v_report");
		});

		test("skips kind directories without part.log", () => {
			const repo = path.join(tempDir, "sales");
			writeRepository(loadScript("sales.vql", salesScript), repo);
			const partLog = path.join(repo, "ASSOCIATIONS", PART_LOG_FILE_NAME);
			fs.rmSync(partLog);

			const { codebase, warnings } = readRepository(repo);

			expect(warnings).toEqual([`${partLog} not found`]);
			expect(codebase.size).toBe(10);
		});

		test("accepts absolute paths in part.log", () => {
			const viewsDir = path.join(tempDir, "VIEWS");
			fs.mkdirSync(viewsDir);
			const codePath = path.join(viewsDir, "v.vql");
			fs.writeFileSync(codePath, "CREATE OR REPLACE VIEW v AS SELECT 1;\n");
			fs.writeFileSync(path.join(viewsDir, PART_LOG_FILE_NAME), `${codePath}\n`);

			const { codebase } = readRepository(tempDir);

			expect(codebase.identities().map(formatIdentity)).toEqual(["VIEWS:v"]);
		});

		test("fails on a directory without kind directories", () => {
			fs.mkdirSync(path.join(tempDir, "src"));

			expect(isRepository(tempDir)).toBe(false);
			expect(() => readRepository(tempDir)).toThrow(RepositoryError);
		});
	});
});
