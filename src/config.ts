import 'dotenv/config';
import dotenv from 'dotenv';
import fs from 'fs-extra';
import { z } from 'zod';
import type { DiceTierBounds, SamplingConfig, SuggestionConfig } from './models.js';
import { InvalidConfigError } from './utils/errorhandler.js';

export type ModelBackend = 'ngram' | 'remote';

export interface AppConfig {
  readonly sampling: SamplingConfig;
  readonly suggestions: SuggestionConfig;
  readonly dice: { readonly enabled: boolean; readonly tiers: DiceTierBounds };
  readonly model: { readonly backend: ModelBackend; readonly url?: string; readonly timeoutMs: number };
  readonly randomSeed?: string;
  readonly contentRoot: string;
  readonly storyDbPath: string;
  readonly historyMaxTokens: number;
  readonly console: { readonly wrapWidth: number; readonly bell: boolean };
}

const ENV_KEYS = {
  temperature: 'TEMPERATURE',
  repetitionPenalty: 'REPETITION_PENALTY',
  topK: 'TOP_K',
  topP: 'TOP_P',
  maxNewTokens: 'MAX_NEW_TOKENS',
  minLength: 'MIN_LENGTH',
  repetitionWindow: 'REPETITION_WINDOW',
  diceEnabled: 'DICE_ENABLED',
  diceCriticalFailureMax: 'DICE_CRITICAL_FAILURE_MAX',
  diceFailureMax: 'DICE_FAILURE_MAX',
  diceSuccessMax: 'DICE_SUCCESS_MAX',
  suggestionCount: 'SUGGESTION_COUNT',
  suggestionMaxTokens: 'SUGGESTION_MAX_TOKENS',
  suggestionTemperature: 'SUGGESTION_TEMPERATURE',
  suggestionTopK: 'SUGGESTION_TOP_K',
  suggestionTopP: 'SUGGESTION_TOP_P',
  suggestionMinLength: 'SUGGESTION_MIN_LENGTH',
  randomSeed: 'RANDOM_SEED',
  modelBackend: 'MODEL_BACKEND',
  modelUrl: 'MODEL_URL',
  modelTimeoutMs: 'MODEL_TIMEOUT_MS',
  contentRoot: 'CONTENT_ROOT',
  storyDbPath: 'STORY_DB_PATH',
  historyMaxTokens: 'HISTORY_MAX_TOKENS',
  textWrapWidth: 'TEXT_WRAP_WIDTH',
  consoleBell: 'CONSOLE_BELL',
} as const;

type ConfigKey = keyof typeof ENV_KEYS;

const ON_VALUES = new Set(['on', 'true', 'yes', '1']);
const OFF_VALUES = new Set(['off', 'false', 'no', '0']);

const flag = z.string().transform((value, ctx) => {
  const normalized = value.toLowerCase();
  if (ON_VALUES.has(normalized)) return true;
  if (OFF_VALUES.has(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be on or off' });
  return z.NEVER;
});

const positive = z.coerce.number().finite().gt(0, 'must be greater than 0');
const count = (min: number) => z.coerce.number().int('must be a whole number').min(min, `must be at least ${min}`);
const probability = z.coerce.number().gt(0, 'must be greater than 0').max(1, 'must be at most 1');
const dieFace = count(0).max(20, 'must be at most 20');

const settingsSchema = z
  .object({
    temperature: positive.default(0.21),
    repetitionPenalty: z.coerce.number().finite().min(0, 'must be 0 or greater').default(1.2),
    topK: count(0).default(100),
    topP: probability.default(0.85),
    maxNewTokens: count(1).default(80),
    minLength: count(0).default(0),
    repetitionWindow: count(0).default(256),
    diceEnabled: flag.default('on'),
    diceCriticalFailureMax: dieFace.default(1),
    diceFailureMax: dieFace.default(9),
    diceSuccessMax: dieFace.default(19),
    suggestionCount: count(0).default(5),
    suggestionMaxTokens: count(1).default(40),
    suggestionTemperature: positive.default(0.65),
    suggestionTopK: count(0).optional(),
    suggestionTopP: probability.optional(),
    suggestionMinLength: count(0).default(2),
    randomSeed: z.string().optional(),
    modelBackend: z.enum(['ngram', 'remote']).default('ngram'),
    modelUrl: z.string().url('must be a URL').optional(),
    modelTimeoutMs: count(1).default(30_000),
    contentRoot: z.string().default('./content'),
    storyDbPath: z.string().default('./data/stories.db'),
    historyMaxTokens: count(1).default(944),
    textWrapWidth: count(0).default(120),
    consoleBell: flag.default('on'),
  })
  .superRefine((settings, ctx) => {
    if (settings.diceFailureMax < settings.diceCriticalFailureMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['diceFailureMax'],
        message: 'must not be below DICE_CRITICAL_FAILURE_MAX',
      });
    }
    if (settings.diceSuccessMax < settings.diceFailureMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['diceSuccessMax'],
        message: 'must not be below DICE_FAILURE_MAX',
      });
    }
    if (settings.modelBackend === 'remote' && !settings.modelUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['modelUrl'],
        message: 'is required when MODEL_BACKEND is remote',
      });
    }
  });

function isConfigKey(value: unknown): value is ConfigKey {
  return typeof value === 'string' && value in ENV_KEYS;
}

function readRawSettings(env: Record<string, string | undefined>): Partial<Record<ConfigKey, string>> {
  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const [key, envVar] of Object.entries(ENV_KEYS)) {
    const value = (env[envVar] ?? '').trim();
    if (value.length > 0 && isConfigKey(key)) raw[key] = value;
  }
  return raw;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/** Validates settings from `env` and returns a frozen configuration. Throws {@link InvalidConfigError}. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const raw = readRawSettings(env);
  const parsed = settingsSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path[0];
    if (isConfigKey(key)) {
      throw new InvalidConfigError(key, issue?.message ?? 'is invalid', { envVar: ENV_KEYS[key], value: raw[key] });
    }
    throw new InvalidConfigError('settings', issue?.message ?? 'are invalid');
  }

  const s = parsed.data;
  const sampling: SamplingConfig = {
    temperature: s.temperature,
    repetitionPenalty: s.repetitionPenalty,
    topK: s.topK,
    topP: s.topP,
    maxNewTokens: s.maxNewTokens,
    minLength: s.minLength,
    repetitionWindow: s.repetitionWindow,
  };

  return deepFreeze<AppConfig>({
    sampling,
    suggestions: {
      count: s.suggestionCount,
      minLength: s.suggestionMinLength,
      sampling: {
        ...sampling,
        temperature: s.suggestionTemperature,
        topK: s.suggestionTopK ?? s.topK,
        topP: s.suggestionTopP ?? s.topP,
        maxNewTokens: s.suggestionMaxTokens,
        minLength: 0,
      },
    },
    dice: {
      enabled: s.diceEnabled,
      tiers: {
        criticalFailureMax: s.diceCriticalFailureMax,
        failureMax: s.diceFailureMax,
        successMax: s.diceSuccessMax,
      },
    },
    model: { backend: s.modelBackend, url: s.modelUrl, timeoutMs: s.modelTimeoutMs },
    randomSeed: s.randomSeed,
    contentRoot: s.contentRoot,
    storyDbPath: s.storyDbPath,
    historyMaxTokens: s.historyMaxTokens,
    console: { wrapWidth: s.textWrapWidth, bell: s.consoleBell },
  });
}

/** Re-reads a dotenv file over `base` for an explicit reload. A missing file reloads `base` alone. */
export function reloadConfig(envFile = '.env', base: Record<string, string | undefined> = process.env): AppConfig {
  const fromFile = fs.pathExistsSync(envFile) ? dotenv.parse(fs.readFileSync(envFile, 'utf8')) : {};
  return loadConfig({ ...base, ...fromFile });
}
