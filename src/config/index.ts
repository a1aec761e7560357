import type { z } from 'zod';
import {
  CoreConfigSchema,
  FastGptConfigSchema,
  SiliconFlowConfigSchema,
  StockAnalysisConfigSchema,
  ResourceSearchConfigSchema,
  NetdiskSearchConfigSchema,
  VideoSearchConfigSchema,
  type Config,
  type DifyConfig,
} from './schema.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type Env = Record<string, string | undefined>;

/**
 * Parse a comma-separated string into an array, filtering empty values
 */
export function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse an integer from environment variable with a default value
 */
export function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a float from environment variable with a default value
 */
export function parseFloatWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a boolean flag. Accepts true/false, 1/0, yes/no, on/off.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

/**
 * Comma-separated trigger list, or the defaults when the variable is unset
 */
function triggers(value: string | undefined, defaults: string[]): string[] {
  const parsed = parseCommaSeparated(value);
  return parsed.length > 0 ? parsed : defaults;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Validate one configuration section against its schema
 *
 * @throws ConfigurationError listing every failing field
 */
export function parseSection<T>(
  section: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown
): T {
  const result = schema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError(section, issues);
  }

  return result.data;
}

/**
 * Load a plugin section. Disabled plugins and invalid sections yield null;
 * an invalid section is logged and never stops the host.
 */
function loadPluginSection<T>(
  section: string,
  enabled: boolean,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: () => unknown
): T | null {
  if (!enabled) {
    logger.info('Plugin disabled by configuration', { plugin: section });
    return null;
  }

  try {
    return parseSection(section, schema, raw());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.warn('Plugin disabled: invalid configuration', {
        plugin: section,
        issues: error.issues,
      });
      return null;
    }
    throw error;
  }
}

/**
 * Shared trigger and credit settings for a plugin env prefix
 */
function commandSettings(env: Env, prefix: string, commands: string[], imageCommands: string[]) {
  return {
    commands: triggers(env[`${prefix}_COMMANDS`], commands),
    imageCommands: triggers(env[`${prefix}_IMAGE_COMMANDS`], imageCommands),
    price: parseIntWithDefault(env[`${prefix}_PRICE`], 0),
    adminIgnore: parseBoolean(env[`${prefix}_ADMIN_IGNORE`], true),
    whitelistIgnore: parseBoolean(env[`${prefix}_WHITELIST_IGNORE`], true),
  };
}

/**
 * Dify settings for the stock plugin's AI deep analysis.
 * Incomplete settings only turn the deep analysis off.
 */
function loadDify(env: Env): DifyConfig | undefined {
  if (!parseBoolean(env.STOCK_ANALYSIS_DIFY_ENABLED, false)) {
    return undefined;
  }

  const apiKey = optional(env.STOCK_ANALYSIS_DIFY_API_KEY);
  const baseUrl = optional(env.STOCK_ANALYSIS_DIFY_BASE_URL);
  if (!apiKey || !baseUrl) {
    logger.warn('Dify configuration incomplete, AI deep analysis disabled');
    return undefined;
  }

  return { apiKey, baseUrl: baseUrl.replace(/\/+$/, '') };
}

/**
 * Load and validate configuration from environment variables
 *
 * @throws ConfigurationError when the core section is invalid
 */
export function loadConfig(env: Env = process.env): Config {
  const core = parseSection('core', CoreConfigSchema, {
    admins: parseCommaSeparated(env.BOT_ADMINS),
    logging: {
      level: optional(env.LOG_LEVEL)?.toLowerCase() ?? 'info',
      auditLogPath: optional(env.AUDIT_LOG_PATH),
    },
    creditDbPath: optional(env.CREDIT_DB_PATH),
    httpTimeoutSeconds: parseIntWithDefault(env.HTTP_TIMEOUT_SECONDS, 60),
  });

  const fastgpt = loadPluginSection(
    'fastgpt',
    parseBoolean(env.FASTGPT_ENABLED, false),
    FastGptConfigSchema,
    () => ({
      ...commandSettings(env, 'FASTGPT', ['fastgpt', '知识库'], ['分析图片']),
      apiKey: env.FASTGPT_API_KEY ?? '',
      baseUrl: optional(env.FASTGPT_BASE_URL),
      imageTtlSeconds: parseIntWithDefault(env.FASTGPT_IMAGE_TTL_SECONDS, 300),
    })
  );

  const siliconflow = loadPluginSection(
    'siliconflow',
    parseBoolean(env.SILICONFLOW_ENABLED, false),
    SiliconFlowConfigSchema,
    () => ({
      ...commandSettings(env, 'SILICONFLOW', ['sf', '硅基'], ['sf识图']),
      apiKey: env.SILICONFLOW_API_KEY ?? '',
      baseUrl: optional(env.SILICONFLOW_BASE_URL),
      model: optional(env.SILICONFLOW_MODEL),
      visionModel: optional(env.SILICONFLOW_VISION_MODEL),
      imageModel: optional(env.SILICONFLOW_IMAGE_MODEL),
      drawCommands: triggers(env.SILICONFLOW_DRAW_COMMANDS, ['sf画图']),
      imageSize: optional(env.SILICONFLOW_IMAGE_SIZE),
      maxTokens: parseIntWithDefault(env.SILICONFLOW_MAX_TOKENS, 1024),
      temperature: parseFloatWithDefault(env.SILICONFLOW_TEMPERATURE, 0.7),
      imageTtlSeconds: parseIntWithDefault(env.SILICONFLOW_IMAGE_TTL_SECONDS, 300),
    })
  );

  const stockAnalysis = loadPluginSection(
    'stock_analysis',
    parseBoolean(env.STOCK_ANALYSIS_ENABLED, false),
    StockAnalysisConfigSchema,
    () => ({
      ...commandSettings(env, 'STOCK_ANALYSIS', ['分析股票', '股票分析', '分析', 'analyze'], []),
      dataBaseUrl: optional(env.STOCK_ANALYSIS_DATA_BASE_URL),
      historyDays: parseIntWithDefault(env.STOCK_ANALYSIS_HISTORY_DAYS, 180),
      usMarketId: parseIntWithDefault(env.STOCK_ANALYSIS_US_MARKET_ID, 105),
      dify: loadDify(env),
    })
  );

  const resourceSearch = loadPluginSection(
    'resource_search',
    parseBoolean(env.RESOURCE_SEARCH_ENABLED, false),
    ResourceSearchConfigSchema,
    () => ({
      ...commandSettings(env, 'RESOURCE_SEARCH', ['搜剧', '全网搜', '搜资源', '搜'], []),
      apiUrl: env.RESOURCE_SEARCH_API_URL ?? '',
      allSearchCommands: triggers(env.RESOURCE_SEARCH_ALL_SEARCH_COMMANDS, ['全网搜', '搜资源']),
      helpCommands: triggers(env.RESOURCE_SEARCH_HELP_COMMANDS, ['搜索帮助', '帮助搜索', '资源搜索帮助']),
      maxResults: parseIntWithDefault(env.RESOURCE_SEARCH_MAX_RESULTS, 5),
      timeoutSeconds: parseIntWithDefault(env.RESOURCE_SEARCH_TIMEOUT_SECONDS, 30),
    })
  );

  const netdiskSearch = loadPluginSection(
    'netdisk_search',
    parseBoolean(env.NETDISK_SEARCH_ENABLED, false),
    NetdiskSearchConfigSchema,
    () => ({
      ...commandSettings(env, 'NETDISK_SEARCH', ['外部搜索'], []),
      quarkCommands: triggers(env.NETDISK_SEARCH_QUARK_COMMANDS, ['夸克搜索']),
      baiduCommands: triggers(env.NETDISK_SEARCH_BAIDU_COMMANDS, ['百度云搜索']),
      defaultType: optional(env.NETDISK_SEARCH_DEFAULT_TYPE)?.toUpperCase(),
      searchUrl: optional(env.NETDISK_SEARCH_URL),
      fallbackUrl: optional(env.NETDISK_SEARCH_FALLBACK_URL),
      shareCheckUrl: optional(env.NETDISK_SEARCH_SHARE_CHECK_URL),
      verifyShares: parseBoolean(env.NETDISK_SEARCH_VERIFY_SHARES, true),
      commandFormat: optional(env.NETDISK_SEARCH_COMMAND_FORMAT)?.replace(/\\n/g, '\n'),
      maxResults: parseIntWithDefault(env.NETDISK_SEARCH_MAX_RESULTS, 5),
      timeoutSeconds: parseIntWithDefault(env.NETDISK_SEARCH_TIMEOUT_SECONDS, 15),
    })
  );

  const videoSearch = loadPluginSection(
    'video_search',
    parseBoolean(env.VIDEO_SEARCH_ENABLED, false),
    VideoSearchConfigSchema,
    () => ({
      ...commandSettings(env, 'VIDEO_SEARCH', ['TVS'], []),
      baseUrl: optional(env.VIDEO_SEARCH_BASE_URL),
      playerPrefix: optional(env.VIDEO_SEARCH_PLAYER_PREFIX),
      groupsOnly: parseBoolean(env.VIDEO_SEARCH_GROUPS_ONLY, true),
      allowedGroups: parseCommaSeparated(env.VIDEO_SEARCH_ALLOWED_GROUPS),
      maxResults: parseIntWithDefault(env.VIDEO_SEARCH_MAX_RESULTS, 10),
      enableEmoji: parseBoolean(env.VIDEO_SEARCH_ENABLE_EMOJI, true),
      cacheTtlSeconds: parseIntWithDefault(env.VIDEO_SEARCH_CACHE_TTL_SECONDS, 300),
      timeoutSeconds: parseIntWithDefault(env.VIDEO_SEARCH_TIMEOUT_SECONDS, 10),
    })
  );

  return {
    core,
    plugins: { fastgpt, siliconflow, stockAnalysis, resourceSearch, netdiskSearch, videoSearch },
  };
}

export type { Config } from './schema.js';
