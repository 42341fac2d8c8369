import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { loadConfig, mergeConfig } from "../src/config";

function writeConfig(value: unknown): string {
	const dir = mkdtempSync(path.join(os.tmpdir(), "volrun-config-"));
	const configPath = path.join(dir, "volrun.config.json");
	writeFileSync(
		configPath,
		typeof value === "string" ? value : `${JSON.stringify(value, null, 2)}\n`,
		"utf-8",
	);
	return configPath;
}

describe("config", () => {
	test("reads the file named by VOLRUN_CONFIG", async () => {
		const configPath = writeConfig({
			toolPath: "/opt/vol/vol",
			outputDir: "/cases/out",
			concurrency: 3,
		});

		const config = await loadConfig({ VOLRUN_CONFIG: configPath });
		expect(config).toEqual({ toolPath: "/opt/vol/vol", outputDir: "/cases/out", concurrency: 3 });
	});

	test("environment overrides the config file", async () => {
		const configPath = writeConfig({ toolPath: "/opt/vol/vol", concurrency: 3 });

		const config = await loadConfig({
			VOLRUN_CONFIG: configPath,
			VOLRUN_TOOL: "/usr/local/bin/vol",
			VOLRUN_CONCURRENCY: "6",
		});
		expect(config.toolPath).toBe("/usr/local/bin/vol");
		expect(config.concurrency).toBe(6);
	});

	test("rejects a non-numeric VOLRUN_CONCURRENCY", async () => {
		const configPath = writeConfig({});
		await expect(
			loadConfig({ VOLRUN_CONFIG: configPath, VOLRUN_CONCURRENCY: "lots" }),
		).rejects.toThrow("Invalid VOLRUN_CONCURRENCY");
	});

	test("a missing explicit config file is an error", async () => {
		const missing = path.join(os.tmpdir(), `volrun-missing-${Date.now()}.json`);
		await expect(loadConfig({ VOLRUN_CONFIG: missing })).rejects.toThrow(
			`Config file not found at ${missing}`,
		);
	});

	test("invalid JSON is an error", async () => {
		const configPath = writeConfig("{ not json");
		await expect(loadConfig({ VOLRUN_CONFIG: configPath })).rejects.toThrow(
			`Invalid JSON in config file: ${configPath}`,
		);
	});

	test("unknown keys and bad values are rejected", async () => {
		const unknownKey = writeConfig({ toolpath: "vol" });
		await expect(loadConfig({ VOLRUN_CONFIG: unknownKey })).rejects.toThrow(
			"Invalid config file",
		);

		const badConcurrency = writeConfig({ concurrency: 0 });
		await expect(loadConfig({ VOLRUN_CONFIG: badConcurrency })).rejects.toThrow("concurrency");
	});

	test("mergeConfig prefers the override", () => {
		expect(
			mergeConfig({ toolPath: "a", outputDir: "out", concurrency: 2 }, { toolPath: "b" }),
		).toEqual({ toolPath: "b", outputDir: "out", concurrency: 2 });
	});
});
