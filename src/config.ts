import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';

export const SYSTEM_EVENTS = ['ack', 'capture_error', 'classify_error', 'announce_error'] as const;
export type SystemEvent = (typeof SYSTEM_EVENTS)[number];

const byte = z.number().int().min(0).max(0xff);

const categoryEntrySchema = z.object({
  asset: z.string().min(1).optional(),
  phraseId: z.number().int().min(1).max(0xff).optional(),
});

const assetsFileSchema = z.object({
  categories: z.record(z.string().min(1), categoryEntrySchema).default({}),
  events: z.record(z.enum(SYSTEM_EVENTS), z.string().min(1)).default({}),
});

const configSchema = z.object({
  // Voice peripheral on the I2C bus
  peripheral: z.object({
    busId: z.number().int().min(0),
    address: z.number().int().min(0x03).max(0x77),
    resultRegister: byte,
    speakRegister: byte,
  }),

  // Keyword spotting
  keywords: z.object({
    modelPath: z.string().min(1),
    entries: z
      .array(
        z.object({
          name: z.string().min(1),
          threshold: z.number().min(0).max(1),
        }),
      )
      .min(1, 'KWS_KEYWORDS must name at least one keyword'),
  }),

  // Microphone input
  audio: z.object({
    device: z.string().min(1),
    sampleRate: z.number().int().positive(),
    maxBufferedFrames: z.number().int().positive(),
    channelCapacity: z.number().int().positive(),
  }),

  // Asset playback
  playback: z.object({
    device: z.string().min(1),
    volume: z.number().int().min(0).max(100),
    timeoutMs: z.number().int().positive(),
  }),

  // Trigger state machine timing
  trigger: z.object({
    cooldownMs: z.number().int().min(0),
    pollIntervalMs: z.number().int().positive(),
    settleMs: z.number().int().min(0),
  }),

  camera: z.object({
    device: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    snapshotPath: z.string().min(1),
    timeoutMs: z.number().int().positive(),
  }),

  classifier: z.object({
    url: z.string().url(),
    timeoutMs: z.number().int().positive(),
  }),

  categories: z.record(z.string().min(1), categoryEntrySchema),
  events: z.record(z.enum(SYSTEM_EVENTS), z.string().min(1)),
});

export type AssistantConfig = DeepReadonly<z.infer<typeof configSchema>>;
export type CategoryEntry = Readonly<z.infer<typeof categoryEntrySchema>>;
export type CategoryMapping = AssistantConfig['categories'];
export type EventAssets = AssistantConfig['events'];
export type KeywordEntry = AssistantConfig['keywords']['entries'][number];

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

type Env = Record<string, string | undefined>;

/**
 * Parse "name:threshold,name:threshold". A bare name uses the default threshold.
 */
export function parseKeywordList(raw: string, defaultThreshold = 0.5): { name: string; threshold: number }[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((item) => {
      const separator = item.lastIndexOf(':');
      if (separator === -1) {
        return { name: item, threshold: defaultThreshold };
      }
      return {
        name: item.slice(0, separator).trim(),
        threshold: parseFloat(item.slice(separator + 1)),
      };
    });
}

/**
 * Integer from env, accepting 0x-prefixed hex (bus addresses are written that way)
 */
function parseIntValue(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const trimmed = value.trim();
  return /^0x/i.test(trimmed) ? parseInt(trimmed.slice(2), 16) : parseInt(trimmed, 10);
}

/**
 * Load the category/event asset mapping. Relative asset paths resolve
 * against the directory of the mapping file.
 */
export function loadAssetsFile(filePath: string): z.infer<typeof assetsFileSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read assets file ${filePath}: ${reason}`);
  }

  const result = assetsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid assets file ${filePath}: ${formatIssues(result.error)}`);
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const resolveAsset = (asset: string) => path.resolve(baseDir, asset);

  const categories: Record<string, z.infer<typeof categoryEntrySchema>> = {};
  for (const [label, entry] of Object.entries(result.data.categories)) {
    categories[label] = entry.asset ? { ...entry, asset: resolveAsset(entry.asset) } : entry;
  }

  const events: Partial<Record<SystemEvent, string>> = {};
  for (const key of SYSTEM_EVENTS) {
    const asset = result.data.events[key];
    if (asset) {
      events[key] = resolveAsset(asset);
    }
  }

  return { categories, events };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the immutable configuration snapshot from environment variables and
 * the assets file. Called once at startup; the result is passed to every
 * component.
 */
export function loadConfig(env: Env = process.env): AssistantConfig {
  const assetsPath = env.ASSETS_CONFIG ?? './config/assets.json';
  const assets = loadAssetsFile(assetsPath);

  const rawConfig = {
    peripheral: {
      busId: parseIntValue(env.I2C_BUS_ID, 4),
      address: parseIntValue(env.I2C_ADDRESS, 0x34),
      resultRegister: parseIntValue(env.I2C_RESULT_REGISTER, 0x64),
      speakRegister: parseIntValue(env.I2C_SPEAK_REGISTER, 0x6e),
    },
    keywords: {
      modelPath: env.KWS_MODEL_PATH ?? './models/openwakeword',
      entries: parseKeywordList(env.KWS_KEYWORDS ?? 'start_sorting:0.3'),
    },
    audio: {
      device: env.AUDIO_DEVICE ?? 'default',
      sampleRate: parseIntValue(env.AUDIO_SAMPLE_RATE, 16000),
      maxBufferedFrames: parseIntValue(env.AUDIO_MAX_BUFFERED_FRAMES, 50),
      channelCapacity: parseIntValue(env.CHANNEL_CAPACITY, 10),
    },
    playback: {
      device: env.PLAYBACK_DEVICE ?? 'default',
      volume: parseIntValue(env.PLAYBACK_VOLUME, 85),
      timeoutMs: parseIntValue(env.PLAYBACK_TIMEOUT_MS, 30000),
    },
    trigger: {
      cooldownMs: parseIntValue(env.TRIGGER_COOLDOWN_MS, 3000),
      pollIntervalMs: parseIntValue(env.TRIGGER_POLL_INTERVAL_MS, 100),
      settleMs: parseIntValue(env.TRIGGER_SETTLE_MS, 500),
    },
    camera: {
      device: env.CAMERA_DEVICE ?? '/dev/video0',
      width: parseIntValue(env.CAMERA_WIDTH, 640),
      height: parseIntValue(env.CAMERA_HEIGHT, 480),
      snapshotPath: env.CAMERA_SNAPSHOT_PATH ?? '/tmp/voice-sort-snapshot.jpg',
      timeoutMs: parseIntValue(env.CAMERA_TIMEOUT_MS, 10000),
    },
    classifier: {
      url: env.CLASSIFIER_URL ?? 'http://localhost:8000/classify',
      timeoutMs: parseIntValue(env.CLASSIFIER_TIMEOUT_MS, 15000),
    },
    categories: assets.categories,
    events: assets.events,
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  return deepFreeze(result.data);
}

/**
 * Load `.env` into process.env. Kept separate so tests can build a config
 * from a plain object without touching the process environment.
 */
export function loadDotenv(): void {
  dotenvConfig();
}
