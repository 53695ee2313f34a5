/**
 * Configuration Support
 *
 * Resolves the data source settings the dashboard runs with.
 *
 * Settings are resolved from (in order of precedence, highest first):
 * 1. CLI flags (always override)
 * 2. Environment (OPENDATA_API_KEY)
 * 3. .windgaugerc in current directory
 * 4. .windgaugerc in home directory
 * 5. Built-in defaults
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { DEFAULT_BASE_URL, DEFAULT_DATASET_ID, MAX_PAGE_SIZE } from "./constants.js";
import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = ".windgaugerc";

/** Environment variable holding the API key */
export const API_KEY_ENV = "OPENDATA_API_KEY";

/**
 * Configuration interface for .windgaugerc
 */
export interface WindgaugeRc {
	/** API root, e.g. https://data.fingrid.fi/api */
	baseUrl?: string;
	/** Dataset to chart (default: 181, wind power generation) */
	datasetId?: number;
	/** Historical query page size, also the scan cap (1-20000) */
	pageSize?: number;
	apiKey?: string;
}

type ConfigDefaults = Required<Omit<WindgaugeRc, "apiKey">>;

export type ResolvedRc = ConfigDefaults & Pick<WindgaugeRc, "apiKey">;

/**
 * Options as commander hands them over (strings, undefined when not given)
 */
export interface CliOptions {
	baseUrl?: string;
	dataset?: string;
	pageSize?: string;
}

/**
 * Final settings passed to the data client
 */
export interface Settings {
	baseUrl: string;
	datasetId: number;
	pageSize: number;
	apiKey: string | undefined;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: ConfigDefaults = {
	baseUrl: DEFAULT_BASE_URL,
	datasetId: DEFAULT_DATASET_ID,
	pageSize: MAX_PAGE_SIZE,
};

const FIELD_SCHEMAS = {
	baseUrl: z.string().url(),
	datasetId: z.number().int().positive(),
	pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE),
	apiKey: z.string().min(1),
};

/**
 * Cached configuration to avoid repeated file reads
 */
let cachedConfig: WindgaugeRc | null = null;
let configLoadedFrom: string | null = null;

function readField<T>(
	obj: Record<string, unknown>,
	key: string,
	schema: z.ZodType<T>,
	warnings: string[],
): T | undefined {
	if (!(key in obj)) return undefined;
	const result = schema.safeParse(obj[key]);
	if (result.success) return result.data;
	warnings.push(`${key}: ${result.error.issues[0]?.message ?? "invalid value"}`);
	return undefined;
}

/**
 * Validate and sanitize config object, dropping invalid keys
 */
function validateConfig(raw: unknown, filePath: string): WindgaugeRc | null {
	const parsed = z.record(z.unknown()).safeParse(raw);
	if (!parsed.success) {
		console.warn(`Warning: Config in ${filePath} is not an object`);
		return null;
	}

	const obj = parsed.data;
	const warnings: string[] = [];
	const config: WindgaugeRc = {};

	const baseUrl = readField(obj, "baseUrl", FIELD_SCHEMAS.baseUrl, warnings);
	if (baseUrl !== undefined) config.baseUrl = baseUrl;
	const datasetId = readField(obj, "datasetId", FIELD_SCHEMAS.datasetId, warnings);
	if (datasetId !== undefined) config.datasetId = datasetId;
	const pageSize = readField(obj, "pageSize", FIELD_SCHEMAS.pageSize, warnings);
	if (pageSize !== undefined) config.pageSize = pageSize;
	const apiKey = readField(obj, "apiKey", FIELD_SCHEMAS.apiKey, warnings);
	if (apiKey !== undefined) config.apiKey = apiKey;

	// Log any warnings
	if (warnings.length > 0) {
		console.warn(`Warning: Invalid config values in ${filePath}:`);
		for (const warning of warnings) {
			console.warn(`  - ${warning}`);
		}
	}

	return config;
}

/**
 * Try to read and parse a config file
 */
function tryReadConfig(filePath: string): WindgaugeRc | null {
	try {
		if (!fs.existsSync(filePath)) {
			return null;
		}

		const content = fs.readFileSync(filePath, "utf-8");
		return validateConfig(JSON.parse(content), filePath);
	} catch (error) {
		if (error instanceof SyntaxError) {
			console.warn(`Warning: Invalid JSON in ${filePath}: ${error.message}`);
			return null;
		}
		throw error;
	}
}

/**
 * Load configuration from .windgaugerc files
 *
 * Searches for config in order:
 * 1. Current directory .windgaugerc
 * 2. Home directory .windgaugerc
 *
 * Returns merged config with defaults
 */
export function loadConfig(forceReload = false): ResolvedRc {
	if (cachedConfig && !forceReload) {
		return { ...DEFAULT_CONFIG, ...cachedConfig };
	}

	let config: WindgaugeRc = {};

	// Try home directory first (lower precedence)
	const homeConfigPath = path.join(os.homedir(), CONFIG_FILE_NAME);
	const homeConfig = tryReadConfig(homeConfigPath);
	if (homeConfig) {
		config = { ...config, ...homeConfig };
		configLoadedFrom = homeConfigPath;
	}

	// Try current directory (higher precedence)
	const cwdConfigPath = path.join(process.cwd(), CONFIG_FILE_NAME);
	const cwdConfig = tryReadConfig(cwdConfigPath);
	if (cwdConfig) {
		config = { ...config, ...cwdConfig };
		configLoadedFrom = cwdConfigPath;
	}

	cachedConfig = config;
	return { ...DEFAULT_CONFIG, ...config };
}

/**
 * Get the path where config was loaded from (for debugging)
 */
export function getConfigSource(): string | null {
	return configLoadedFrom;
}

function parseCliInteger(value: string, option: string, schema: z.ZodType<number>): number {
	const trimmed = value.trim();
	const result = schema.safeParse(/^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN);
	if (!result.success) {
		throw new ConfigError(`Invalid value for ${option}: "${value}" (${result.error.issues[0]?.message})`, option);
	}
	return result.data;
}

/**
 * Merge CLI flags, environment and config files into final settings
 *
 * @throws ConfigError when a CLI flag holds an invalid value
 */
export function resolveSettings(cliOptions: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): Settings {
	const config = loadConfig();

	let baseUrl = config.baseUrl;
	if (cliOptions.baseUrl !== undefined) {
		const result = FIELD_SCHEMAS.baseUrl.safeParse(cliOptions.baseUrl);
		if (!result.success) {
			throw new ConfigError(`Invalid value for --base-url: "${cliOptions.baseUrl}"`, "--base-url");
		}
		baseUrl = result.data;
	}

	const datasetId =
		cliOptions.dataset !== undefined
			? parseCliInteger(cliOptions.dataset, "--dataset", FIELD_SCHEMAS.datasetId)
			: config.datasetId;
	const pageSize =
		cliOptions.pageSize !== undefined
			? parseCliInteger(cliOptions.pageSize, "--page-size", FIELD_SCHEMAS.pageSize)
			: config.pageSize;

	const envKey = env[API_KEY_ENV];
	const apiKey = envKey !== undefined && envKey !== "" ? envKey : config.apiKey;

	return { baseUrl, datasetId, pageSize, apiKey };
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
	cachedConfig = null;
	configLoadedFrom = null;
}

/**
 * Get default config values (for documentation)
 */
export function getDefaultConfig(): ResolvedRc {
	return { ...DEFAULT_CONFIG };
}
