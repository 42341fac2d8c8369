import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { concurrencySchema, fileConfigSchema, formatSchemaIssues } from "./schema";
import type { Config } from "./types";

export const DEFAULT_USER_CONFIG_PATH = path.join(os.homedir(), ".config", "volrun", "config.json");

function defaultConfigPaths(): string[] {
	return [path.resolve(process.cwd(), "volrun.config.json"), DEFAULT_USER_CONFIG_PATH];
}

/**
 * Config file, then environment. Command-line flags are layered on top by the CLI.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
	const configPath = resolveConfigPath(env);
	const fileConfig = configPath ? await readConfigFile(configPath) : {};
	const envConfig = loadEnvConfig(env);
	return mergeConfig(fileConfig, envConfig);
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string | undefined {
	const explicitPath = env.VOLRUN_CONFIG;
	if (explicitPath && explicitPath.trim().length > 0) {
		if (!existsSync(explicitPath)) {
			throw new Error(`Config file not found at ${explicitPath}`);
		}
		return explicitPath;
	}
	for (const candidate of defaultConfigPaths()) {
		if (existsSync(candidate)) {
			return candidate;
		}
	}
	return undefined;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Config {
	const config: Config = {};
	const toolPath = env.VOLRUN_TOOL?.trim();
	if (toolPath) {
		config.toolPath = toolPath;
	}
	const concurrency = env.VOLRUN_CONCURRENCY?.trim();
	if (concurrency) {
		const parsed = concurrencySchema.safeParse(concurrency);
		if (!parsed.success) {
			throw new Error(`Invalid VOLRUN_CONCURRENCY: ${formatSchemaIssues(parsed.error)}`);
		}
		config.concurrency = parsed.data;
	}
	return config;
}

async function readConfigFile(configPath: string): Promise<Config> {
	const raw = await readFile(configPath, "utf-8");
	const parsed = safeJsonParse(raw);
	if (parsed === null) {
		throw new Error(`Invalid JSON in config file: ${configPath}`);
	}
	const result = fileConfigSchema.safeParse(parsed);
	if (!result.success) {
		throw new Error(`Invalid config file ${configPath}: ${formatSchemaIssues(result.error)}`);
	}
	return result.data;
}

function safeJsonParse(raw: string): unknown | null {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}

export function mergeConfig(base: Config, override: Config): Config {
	return {
		toolPath: override.toolPath ?? base.toolPath,
		outputDir: override.outputDir ?? base.outputDir,
		concurrency: override.concurrency ?? base.concurrency,
	};
}
