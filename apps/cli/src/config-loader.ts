import type { PipelineConfig } from "@coursecheck/core";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import type { ParseOptions } from "./types";

/**
 * Everything a config file can set. The catalog is optional here and
 * required once CLI flags are merged in.
 */
export type FileConfig = Omit<PipelineConfig, "paths" | "catalogPath"> & { catalogPath?: string };

/**
 * Default built-in configuration.
 */
export const DEFAULT_CONFIG: FileConfig = {
    include: ["**/*.json"],
    exclude: ["**/node_modules/**"],
    maxFiles: 10000,
    maxFileSizeMb: 10,
    creditLimits: { regular: 22, summer: 9 },
    format: "text",
    outputDir: "reports",
};

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["coursecheck.config.json", ".coursecheck.json"];

const patterns = z.array(z.string().min(1));
const positive = z.number().positive();
const format = z.enum(["text", "json"]);

const limitsSchema = z.object({
    regular: positive.optional(),
    summer: positive.optional(),
});

/**
 * Flat keys, or the same settings nested under discovery.*, limits.* and output.*.
 */
const configFileSchema = z.object({
    include: patterns.optional(),
    exclude: patterns.optional(),
    maxFiles: z.number().int().positive().optional(),
    maxFileSizeMb: positive.optional(),
    creditLimits: limitsSchema.optional(),
    outputDir: z.string().min(1).optional(),
    format: format.optional(),
    catalog: z.string().min(1).optional(),
    workers: z.number().int().min(1).max(32).optional(),
    discovery: z
        .object({
            include: patterns.optional(),
            exclude: patterns.optional(),
            maxFiles: z.number().int().positive().optional(),
            maxFileSizeMb: positive.optional(),
        })
        .optional(),
    limits: limitsSchema.optional(),
    output: z
        .object({
            dir: z.string().min(1).optional(),
            format: format.optional(),
        })
        .optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Loads and merges configuration from files and CLI options.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. COURSECHECK_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/coursecheck/config.json)
     */
    static findConfigFile(startDir: string = process.cwd()): string | undefined {
        // Priority 1: COURSECHECK_CONFIG env var
        const envConfig = process.env.COURSECHECK_CONFIG;
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        // Priority 2: Walk up from startDir to git root
        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            // Check for git root
            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        // Priority 3: User config
        const homeDir = process.env.HOME;
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "coursecheck", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load configuration from file. Relative catalog and output paths are
     * taken relative to the config file.
     * @throws Error if config file is invalid JSON or has invalid settings
     */
    static async load(path?: string): Promise<FileConfig> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            throw new Error(`Invalid config file: parse error at ${path}`);
        }

        const result = configFileSchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
            throw new Error(`Invalid config file ${path}: ${issues.join("; ")}`);
        }

        return this.mergeWithDefaults(result.data, dirname(resolve(path)));
    }

    /**
     * Merge user config with defaults. Nested keys win over flat ones.
     */
    private static mergeWithDefaults(file: ConfigFile, baseDir: string): FileConfig {
        const limits = { ...DEFAULT_CONFIG.creditLimits, ...file.creditLimits, ...file.limits };
        const config: FileConfig = {
            include: file.discovery?.include ?? file.include ?? DEFAULT_CONFIG.include,
            exclude: file.discovery?.exclude ?? file.exclude ?? DEFAULT_CONFIG.exclude,
            maxFiles: file.discovery?.maxFiles ?? file.maxFiles ?? DEFAULT_CONFIG.maxFiles,
            maxFileSizeMb: file.discovery?.maxFileSizeMb ?? file.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb,
            creditLimits: {
                regular: limits.regular ?? 22,
                summer: limits.summer ?? 9,
            },
            format: file.output?.format ?? file.format ?? DEFAULT_CONFIG.format,
            outputDir: DEFAULT_CONFIG.outputDir,
        };
        const outputDir = file.output?.dir ?? file.outputDir;
        if (outputDir !== undefined) {
            config.outputDir = resolve(baseDir, outputDir);
        }
        if (file.catalog !== undefined) {
            config.catalogPath = resolve(baseDir, file.catalog);
        }
        if (file.workers !== undefined) {
            config.workers = file.workers;
        }
        return config;
    }

    /**
     * Merge base config with CLI options (CLI wins).
     * --include replaces the configured patterns, --exclude adds to them.
     */
    static mergeWithCLI(
        base: FileConfig,
        options: Pick<ParseOptions, "include" | "exclude" | "catalogPath" | "outputDir" | "format" | "workers" | "serial">,
    ): FileConfig {
        const merged: FileConfig = {
            ...base,
            include: options.include.length > 0 ? [...options.include] : base.include,
            exclude: [...(base.exclude ?? []), ...options.exclude],
        };
        if (options.catalogPath !== undefined) merged.catalogPath = options.catalogPath;
        if (options.outputDir !== undefined) merged.outputDir = options.outputDir;
        if (options.format !== undefined) merged.format = options.format;
        if (options.workers !== undefined) merged.workers = options.workers;
        if (options.serial) merged.workers = 1;
        return merged;
    }
}
