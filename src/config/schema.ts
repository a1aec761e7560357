import { z } from 'zod';

/**
 * Model names as SiliconFlow and FastGPT spell them, e.g. "deepseek-ai/DeepSeek-V3"
 */
const SafeModelNameSchema = z.string()
  .regex(/^[a-zA-Z0-9_./:-]+$/, 'Model name contains invalid characters');

const BaseUrlSchema = z.string()
  .url('Base URL must be a valid URL')
  .refine((u) => u.startsWith('https://') || u.startsWith('http://'), 'Base URL must use http or https')
  .transform((u) => u.replace(/\/+$/, ''));

const ApiKeySchema = z.string().min(1, 'API key is required');

/**
 * Ordered trigger set; case-sensitive as configured, matched case-insensitively
 */
const TriggerListSchema = z.array(z.string().min(1)).min(1, 'At least one command is required');

/**
 * Settings every command plugin shares: triggers and credit policy
 */
const CommandPluginSchema = z.object({
  /** Plain command triggers, first match in this order wins */
  commands: TriggerListSchema,
  /** Triggers that consume the chat's cached attachment */
  imageCommands: z.array(z.string().min(1)).default([]),
  /** Credits charged per successful invocation; 0 disables billing */
  price: z.number().int().nonnegative().default(0),
  /** Admins are not charged */
  adminIgnore: z.boolean().default(true),
  /** Whitelisted users are not charged */
  whitelistIgnore: z.boolean().default(true),
});

export type CommandPluginConfig = z.infer<typeof CommandPluginSchema>;

export const FastGptConfigSchema = CommandPluginSchema.extend({
  apiKey: ApiKeySchema,
  baseUrl: BaseUrlSchema.default('https://api.fastgpt.in/api'),
  /** How long a received image waits for an image command */
  imageTtlSeconds: z.number().int().positive().default(300),
});

export type FastGptConfig = z.infer<typeof FastGptConfigSchema>;

export const SiliconFlowConfigSchema = CommandPluginSchema.extend({
  apiKey: ApiKeySchema,
  baseUrl: BaseUrlSchema.default('https://api.siliconflow.cn/v1'),
  model: SafeModelNameSchema.default('deepseek-ai/DeepSeek-V3'),
  visionModel: SafeModelNameSchema.default('Qwen/Qwen2-VL-72B-Instruct'),
  imageModel: SafeModelNameSchema.default('black-forest-labs/FLUX.1-schnell'),
  /** Triggers for text-to-image generation, checked before chat commands */
  drawCommands: z.array(z.string().min(1)).default([]),
  imageSize: z.string().regex(/^\d+x\d+$/, 'Image size must look like 1024x1024').default('1024x1024'),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0.7),
  imageTtlSeconds: z.number().int().positive().default(300),
});

export type SiliconFlowConfig = z.infer<typeof SiliconFlowConfigSchema>;

const DifySchema = z.object({
  apiKey: ApiKeySchema,
  baseUrl: BaseUrlSchema,
});

export type DifyConfig = z.infer<typeof DifySchema>;

export const StockAnalysisConfigSchema = CommandPluginSchema.extend({
  dataBaseUrl: BaseUrlSchema.default('https://push2his.eastmoney.com'),
  /** Calendar days of daily bars requested on the first attempt */
  historyDays: z.number().int().min(30).max(3650).default(180),
  /** Eastmoney market id for US tickers (105 NASDAQ, 106 NYSE) */
  usMarketId: z.number().int().positive().default(105),
  /** AI deep analysis; absent when not configured */
  dify: DifySchema.optional(),
});

export type StockAnalysisConfig = z.infer<typeof StockAnalysisConfigSchema>;

export const ResourceSearchConfigSchema = CommandPluginSchema.extend({
  apiUrl: BaseUrlSchema,
  /** Triggers that go straight to the whole-web search */
  allSearchCommands: z.array(z.string().min(1)).default([]),
  helpCommands: z.array(z.string().min(1)).default([]),
  maxResults: z.number().int().positive().max(20).default(5),
  timeoutSeconds: z.number().int().positive().default(30),
});

export type ResourceSearchConfig = z.infer<typeof ResourceSearchConfigSchema>;

export const NetdiskSearchConfigSchema = CommandPluginSchema.extend({
  /** Triggers that always search Quark shares */
  quarkCommands: z.array(z.string().min(1)).default([]),
  /** Triggers that always search Baidu shares */
  baiduCommands: z.array(z.string().min(1)).default([]),
  /** Disk type searched by the plain commands */
  defaultType: z.enum(['QUARK', 'BDY']).default('QUARK'),
  /** Disk search API, queried first */
  searchUrl: BaseUrlSchema.default('https://waliso.com'),
  /** Secondary Quark index, queried when the disk search finds nothing */
  fallbackUrl: BaseUrlSchema.optional(),
  /** Quark share API used to drop expired share links */
  shareCheckUrl: BaseUrlSchema.default('https://drive-m.quark.cn'),
  verifyShares: z.boolean().default(true),
  /** Reply for a command without a keyword */
  commandFormat: z.string().min(1).default('搜索指令：\n外部搜索+资源名称'),
  maxResults: z.number().int().positive().max(20).default(5),
  timeoutSeconds: z.number().int().positive().default(15),
});

export type NetdiskSearchConfig = z.infer<typeof NetdiskSearchConfigSchema>;

export const VideoSearchConfigSchema = CommandPluginSchema.extend({
  /** Video site whose search page is scraped */
  baseUrl: BaseUrlSchema.default('https://www.tvs1.vip'),
  /** Prepended to play links, e.g. a web player that takes ?url= */
  playerPrefix: z.string().default(''),
  /** Only answer in group chats */
  groupsOnly: z.boolean().default(true),
  /** Group chat ids allowed to search; empty allows every group */
  allowedGroups: z.array(z.string().min(1)).default([]),
  maxResults: z.number().int().positive().max(30).default(10),
  enableEmoji: z.boolean().default(true),
  /** How long search results stay available for picking */
  cacheTtlSeconds: z.number().int().positive().default(300),
  timeoutSeconds: z.number().int().positive().default(10),
});

export type VideoSearchConfig = z.infer<typeof VideoSearchConfigSchema>;

/**
 * Host-level settings. Invalid values here stop startup.
 */
export const CoreConfigSchema = z.object({
  /** Host admin wxids */
  admins: z.array(z.string().min(1)).default([]),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    auditLogPath: z.string().optional(),
  }),
  /** SQLite path for the built-in credit ledger */
  creditDbPath: z.string().min(1).default('./data/credits.db'),
  /** Per-request timeout for every provider call */
  httpTimeoutSeconds: z.number().int().positive().max(600).default(60),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

export interface Config {
  core: CoreConfig;
  /** A plugin section is null when the plugin is disabled or misconfigured */
  plugins: {
    fastgpt: FastGptConfig | null;
    siliconflow: SiliconFlowConfig | null;
    stockAnalysis: StockAnalysisConfig | null;
    resourceSearch: ResourceSearchConfig | null;
    netdiskSearch: NetdiskSearchConfig | null;
    videoSearch: VideoSearchConfig | null;
  };
}
