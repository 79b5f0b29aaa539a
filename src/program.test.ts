import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runProgram, EXIT_CHANGES, EXIT_ERROR } from "./program";

/**
 * CLI tests
 *
 * These drive the commander program in process and capture its output.
 */
describe("CLI", () => {
	const fixturePath = path.resolve(process.cwd(), "src/__fixtures__/sales.vql");
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "vql-cli-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	/**
	 * Run CLI command and return result
	 */
	function runCli(...args: string[]): { out: string[]; err: string[]; exitCode: number } {
		const out: string[] = [];
		const err: string[] = [];
		let exitCode = 0;
		runProgram(["--log-level", "error", ...args], {
			out: (text) => out.push(text),
			err: (text) => err.push(text),
			setExitCode: (code) => {
				exitCode = code;
			},
		});
		return { out, err, exitCode };
	}

	describe("split and merge", () => {
		test("splits a script into a repository and merges it back", () => {
			const repo = path.join(tempDir, "repo");
			const merged = path.join(tempDir, "merged.vql");

			const split = runCli("split", fixturePath, "-o", repo);
			const merge = runCli("merge", repo, "-o", merged);

			expect(split.out).toEqual([`Split 11 object(s) into ${repo}`]);
			expect(merge.out).toEqual([`Merged 11 object(s) into ${merged}`]);
			expect(fs.existsSync(path.join(repo, "VIEWS", "part.log"))).toBe(true);
			expect(runCli("compare", fixturePath, merged).exitCode).toBe(0);
		});

		test("refuses to overwrite without --force", () => {
			const repo = path.join(tempDir, "repo");
			runCli("split", fixturePath, "-o", repo);

			const again = runCli("split", fixturePath, "-o", repo);
			const forced = runCli("split", fixturePath, "-o", repo, "--force");

			expect(again.exitCode).toBe(EXIT_ERROR);
			expect(again.err).toEqual([`Error: ${repo} is not empty; use force to overwrite the repository`]);
			expect(forced.exitCode).toBe(0);
		});
	});

	describe("compare", () => {
		test("reports no changes for identical sources", () => {
			const result = runCli("compare", fixturePath, fixturePath);

			expect(result.out).toEqual(["Comparing sales.vql with sales.vql\nNo changes."]);
			expect(result.exitCode).toBe(0);
		});

		test("exits with 1 when there are changes", () => {
			const edited = path.join(tempDir, "edited.vql");
			const script = fs.readFileSync(fixturePath, "utf-8");
			fs.writeFileSync(edited, script.replace("ENDPOINT report v_report (0,*)", "ENDPOINT report v_report (1,*)"));

			const result = runCli("compare", fixturePath, edited);

			expect(result.exitCode).toBe(EXIT_CHANGES);
			expect(result.out[0].split("\n")).toEqual([
				"Comparing sales.vql with edited.vql",
				"  CHANGED  ASSOCIATIONS:a_customer_report",
				"Total: 0 added, 0 removed, 1 changed, 0 cascaded, 10 unchanged",
			]);
		});

		test("prints JSON with --json", () => {
			const repo = path.join(tempDir, "repo");
			runCli("split", fixturePath, "-o", repo);
			fs.rmSync(path.join(repo, "BASE VIEWS"), { recursive: true });

			const result = runCli("compare", fixturePath, repo, "--json");
			const json = JSON.parse(result.out[0]);

			expect(json.removed).toEqual(["BASE VIEWS:bv_customer"]);
			expect(json.cascade).toEqual([
				"ASSOCIATIONS:a_customer_report",
				"VIEWS:v_customer",
				"VIEWS:v_customer_10",
				"VIEWS:v_report",
			]);
		});

		test("usage errors exit with the error code, not the changes code", () => {
			const missingArgument = runCli("compare", fixturePath);
			const unknownOption = runCli("compare", fixturePath, fixturePath, "--jsonn");

			expect(missingArgument.exitCode).toBe(EXIT_ERROR);
			expect(missingArgument.err).toEqual(["error: missing required argument 'new'"]);
			expect(unknownOption.exitCode).toBe(EXIT_ERROR);
		});

		test("reports missing sources", () => {
			const missing = path.join(tempDir, "missing.vql");

			const result = runCli("compare", fixturePath, missing);

			expect(result.exitCode).toBe(EXIT_ERROR);
			expect(result.err).toEqual([`Error: No script file or repository at ${missing}`]);
		});
	});

	describe("list", () => {
		test("lists objects by kind", () => {
			const result = runCli("list", fixturePath);

			expect(result.out.slice(0, 3)).toEqual(["ASSOCIATIONS:a_customer_report", "BASE VIEWS:bv_customer", "DATABASE:sales"]);
			expect(result.out[result.out.length - 1]).toBe("Total: 11 object(s)");
		});

		test("groups by folder with --folders", () => {
			const result = runCli("list", fixturePath, "--folders");

			expect(result.out.slice(0, 3)).toEqual(["/", "  DATABASE:sales", "/01_sources"]);
		});
	});

	describe("dependents and dependencies", () => {
		test("lists transitive dependents", () => {
			const result = runCli("dependents", fixturePath, "BASE VIEWS:bv_customer");

			expect(result.out).toEqual([
				"ASSOCIATIONS:a_customer_report",
				"VIEWS:v_customer",
				"VIEWS:v_customer_10",
				"VIEWS:v_report",
			]);
		});

		test("lists transitive dependencies", () => {
			const result = runCli("dependencies", fixturePath, "views:V_Customer");

			expect(result.out).toEqual(["BASE VIEWS:bv_customer", "DATASOURCES:ds_crm", "WRAPPERS:w_customer"]);
		});

		test("reports objects without dependents", () => {
			expect(runCli("dependents", fixturePath, "ASSOCIATIONS:a_customer_report").out).toEqual(["No dependents."]);
		});

		test("rejects unknown and malformed objects", () => {
			const unknown = runCli("dependents", fixturePath, "VIEWS:nope");
			const malformed = runCli("dependencies", fixturePath, "nope");

			expect(unknown.err).toEqual(["Error: sales.vql has no object VIEWS:nope"]);
			expect(unknown.exitCode).toBe(EXIT_ERROR);
			expect(malformed.err).toEqual(['Error: Invalid object "nope"; expected KIND:name, e.g. "VIEWS:customer"']);
		});
	});

	describe("extract", () => {
		test("writes the selection with its dependencies", () => {
			const output = path.join(tempDir, "customer.vql");

			const result = runCli("extract", fixturePath, "VIEWS:v_customer", "-o", output);

			expect(result.out).toEqual([`Extracted 4 object(s) into ${output}`]);
			expect(runCli("list", output).out).toEqual([
				"BASE VIEWS:bv_customer",
				"DATASOURCES:ds_crm",
				"VIEWS:v_customer",
				"WRAPPERS:w_customer",
				"Total: 4 object(s)",
			]);
		});
	});
});
