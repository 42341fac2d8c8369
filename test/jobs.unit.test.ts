import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { BatchInputError } from "../src/errors";
import { buildJobs, outputPathFor, parseJobList, readJobList } from "../src/jobs";

describe("parseJobList", () => {
	test("one job per non-empty line, CRLF endings accepted", () => {
		expect(parseJobList("pslist\n\npstree\r\n\r\nnetscan\n")).toEqual([
			"pslist",
			"pstree",
			"netscan",
		]);
	});

	test("names are taken verbatim, surrounding spaces included", () => {
		expect(parseJobList("pslist \n  pstree\n   \n")).toEqual(["pslist ", "  pstree", "   "]);
	});

	test("keeps duplicates as separate jobs", () => {
		expect(parseJobList("pslist\npslist\n")).toEqual(["pslist", "pslist"]);
	});

	test("an empty file yields no jobs", () => {
		expect(parseJobList("")).toEqual([]);
		expect(parseJobList("\n\n")).toEqual([]);
	});
});

describe("outputPathFor", () => {
	test("joins output dir, image base name and job name", () => {
		expect(
			outputPathFor({ outputDir: "out", imagePath: "/cases/host.raw", jobName: "pslist" }),
		).toBe(path.join("out", "host.raw_pslist.csv"));
	});

	test("is the same path for repeated runs of a job", () => {
		const jobs = buildJobs(["pslist", "pslist"], { outputDir: "out", imagePath: "img/mem.dd" });
		expect(jobs[0]).toEqual({ name: "pslist", outputPath: path.join("out", "mem.dd_pslist.csv") });
		expect(jobs[1].outputPath).toBe(jobs[0].outputPath);
	});
});

describe("readJobList", () => {
	test("reads and parses the file", async () => {
		const dir = mkdtempSync(path.join(os.tmpdir(), "volrun-jobs-"));
		const modulesPath = path.join(dir, "modules.txt");
		writeFileSync(modulesPath, "windows.pslist\n\nwindows.netscan\n", "utf-8");

		await expect(readJobList(modulesPath)).resolves.toEqual(["windows.pslist", "windows.netscan"]);
	});

	test("an unreadable file is a batch input error", async () => {
		const dir = mkdtempSync(path.join(os.tmpdir(), "volrun-jobs-"));
		await expect(readJobList(path.join(dir, "missing.txt"))).rejects.toBeInstanceOf(
			BatchInputError,
		);
	});
});
