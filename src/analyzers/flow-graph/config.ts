/**
 * Flow Lint Configuration Loader
 * Handles loading and merging configuration from multiple sources
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { parseJsonFile } from '../../utils/json-utils.js';
import { DEFAULT_LOOP_SETTINGS } from './passes/loop-detection-pass.js';
import { PASS_ORDER, type FlowLintConfig, type PassId, type PassSetting } from './types.js';

/** Configuration directory name */
export const CONFIG_DIR_NAME = '.flow-lint';

/**
 * Config file names to search for (in priority order)
 */
const CONFIG_FILE_NAMES = ['flow-lint.json', 'config.json'];

/**
 * Default configuration used when no config file is found
 */
export const DEFAULT_CONFIG: FlowLintConfig = {
  passes: {
    reachability: 'on',
    'handler-completeness': 'on',
    'stuck-state': 'on',
    'route-group-usage': 'on',
    'loop-detection': 'on',
  },
  loopDetection: DEFAULT_LOOP_SETTINGS,
};

const PassSettingSchema = z.enum(['on', 'off']);

export const FlowLintConfigFileSchema = z
  .object({
    $schema: z.string().optional(),
    passes: z
      .object({
        reachability: PassSettingSchema.optional(),
        'handler-completeness': PassSettingSchema.optional(),
        'stuck-state': PassSettingSchema.optional(),
        'route-group-usage': PassSettingSchema.optional(),
        'loop-detection': PassSettingSchema.optional(),
      })
      .strict()
      .optional(),
    loopDetection: z
      .object({
        threshold: z.number().int().positive().optional(),
        plainPageCost: z.number().int().positive().optional(),
        entryActionCost: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FlowLintConfigFile = z.infer<typeof FlowLintConfigFileSchema>;

/**
 * Find config file in a directory
 */
function findConfigInDir(dir: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = path.join(dir, fileName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Discover config file path
 * Search order: CLI arg > ./.flow-lint/ > ~/.flow-lint/
 */
export function discoverConfigPath(cliConfigPath?: string, cwd: string = process.cwd()): string | null {
  // 1. CLI-provided path
  if (cliConfigPath) {
    if (fs.existsSync(cliConfigPath)) {
      return cliConfigPath;
    }
    throw new ConfigurationError(`Config file not found: ${cliConfigPath}`, cliConfigPath);
  }

  // 2. Project-level
  const projectConfig = findConfigInDir(path.join(cwd, CONFIG_DIR_NAME));
  if (projectConfig) {
    return projectConfig;
  }

  // 3. User-level
  const homeDir = process.env.HOME || process.env.USERPROFILE || '';
  if (homeDir) {
    const userConfig = findConfigInDir(path.join(homeDir, CONFIG_DIR_NAME));
    if (userConfig) {
      return userConfig;
    }
  }

  return null;
}

/**
 * Parse and validate config file
 */
async function parseConfigFile(configPath: string): Promise<FlowLintConfigFile> {
  const result = await parseJsonFile(configPath, FlowLintConfigFileSchema);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${configPath}: ${result.error}`, configPath);
  }
  return result.data;
}

/**
 * Deep merge a config file over a base config
 */
export function mergeConfigs(base: FlowLintConfig, override: FlowLintConfigFile): FlowLintConfig {
  const passes: Record<PassId, PassSetting> = { ...base.passes };
  for (const id of PASS_ORDER) {
    const setting = override.passes?.[id];
    if (setting !== undefined) {
      passes[id] = setting;
    }
  }

  const loop = override.loopDetection;
  return {
    passes,
    loopDetection: {
      threshold: loop?.threshold ?? base.loopDetection.threshold,
      plainPageCost: loop?.plainPageCost ?? base.loopDetection.plainPageCost,
      entryActionCost: loop?.entryActionCost ?? base.loopDetection.entryActionCost,
    },
  };
}

/**
 * Load configuration from all sources and merge
 */
export async function loadConfig(cliConfigPath?: string, cwd?: string): Promise<FlowLintConfig> {
  const configPath = discoverConfigPath(cliConfigPath, cwd);
  if (!configPath) {
    return DEFAULT_CONFIG;
  }
  return mergeConfigs(DEFAULT_CONFIG, await parseConfigFile(configPath));
}

/**
 * Apply a loop threshold override (e.g. from the command line)
 */
export function withThreshold(config: FlowLintConfig, threshold: number | undefined): FlowLintConfig {
  if (threshold === undefined) return config;
  if (!Number.isInteger(threshold) || threshold <= 0) {
    throw new ConfigurationError(`Loop threshold must be a positive integer, got ${threshold}`);
  }
  return {
    ...config,
    loopDetection: { ...config.loopDetection, threshold },
  };
}
