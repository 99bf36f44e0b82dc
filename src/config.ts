import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';

const ASSETS_DIR = path.resolve(__dirname, '..', 'assets');

const CanvasSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const AppConfigSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535),
  videoPath: z.string().startsWith('/'),
  statusPath: z.string().startsWith('/'),
  controlPath: z.string().startsWith('/'),

  connectTimeoutMs: z.number().int().positive(),
  videoHeaderTimeoutMs: z.number().int().positive(),
  controlTimeoutMs: z.number().int().positive(),
  statusTimeoutMs: z.number().int().positive(),
  statusPollIntervalMs: z.number().int().positive(),
  displayIntervalMs: z.number().int().positive(),

  modelPath: z.string().min(1),
  labelsPath: z.string().min(1),

  detection: z.object({
    enabled: z.boolean(),
    inputSize: z.number().int().positive(),
    confidenceThreshold: z.number().min(0).max(1),
    iouThreshold: z.number().min(0).max(1),
    cooldownMs: z.number().int().nonnegative(),
  }),

  stream: z.object({
    maxBufferBytes: z.number().int().positive(),
    minFrameBytes: z.number().int().nonnegative(),
  }),

  canvas: CanvasSchema.optional(),
  remoteLogUrl: z.string().url().optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type CanvasConfig = z.infer<typeof CanvasSchema>;

export const DEFAULT_CONFIG: Omit<AppConfig, 'host'> = {
  port: 5000,
  videoPath: '/video_feed',
  statusPath: '/api/status',
  controlPath: '/api/control',

  connectTimeoutMs: 8000,
  videoHeaderTimeoutMs: 10000,
  controlTimeoutMs: 2000,
  statusTimeoutMs: 3000,
  statusPollIntervalMs: 5000,
  displayIntervalMs: 40,

  modelPath: path.join(ASSETS_DIR, 'detect.onnx'),
  labelsPath: path.join(ASSETS_DIR, 'coco_labels.txt'),

  detection: {
    enabled: true,
    inputSize: 300,
    confidenceThreshold: 0.45,
    iouThreshold: 0.4,
    cooldownMs: 150,
  },

  stream: {
    maxBufferBytes: 3 * 1024 * 1024,
    minFrameBytes: 500,
  },
};

/** Settings a caller (the CLI) may override on top of env and defaults. */
export interface ConfigOverrides {
  host?: string;
  port?: number;
  modelPath?: string;
  labelsPath?: string;
  detectionEnabled?: boolean;
  confidenceThreshold?: number;
  canvas?: CanvasConfig;
  remoteLogUrl?: string;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

export function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    host: env.ROVER_HOST || undefined,
    port: envNumber(env.ROVER_PORT),
    modelPath: env.ROVER_MODEL_PATH || undefined,
    labelsPath: env.ROVER_LABELS_PATH || undefined,
    remoteLogUrl: env.ROVER_REMOTE_LOG_URL || undefined,
  };
}

/** Defaults, then environment, then explicit overrides; validated. */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const fromEnv = overridesFromEnv(env);
  const pick = <K extends keyof ConfigOverrides>(key: K): ConfigOverrides[K] =>
    overrides[key] ?? fromEnv[key];

  const candidate = {
    ...DEFAULT_CONFIG,
    host: pick('host') ?? '',
    port: pick('port') ?? DEFAULT_CONFIG.port,
    modelPath: pick('modelPath') ?? DEFAULT_CONFIG.modelPath,
    labelsPath: pick('labelsPath') ?? DEFAULT_CONFIG.labelsPath,
    detection: {
      ...DEFAULT_CONFIG.detection,
      enabled: pick('detectionEnabled') ?? DEFAULT_CONFIG.detection.enabled,
      confidenceThreshold: pick('confidenceThreshold') ?? DEFAULT_CONFIG.detection.confidenceThreshold,
    },
    canvas: pick('canvas'),
    remoteLogUrl: pick('remoteLogUrl'),
  };

  const parsed = AppConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function serverBaseUrl(config: Pick<AppConfig, 'host' | 'port'>): string {
  return `http://${config.host}:${config.port}`;
}

export function endpointsFor(config: AppConfig) {
  const base = serverBaseUrl(config);
  return {
    base,
    video: `${base}${config.videoPath}`,
    status: `${base}${config.statusPath}`,
    control: `${base}${config.controlPath}`,
  };
}

/** Parses `640x480` into a canvas size. */
export function parseCanvas(value: string): CanvasConfig {
  const match = /^(\d+)x(\d+)$/i.exec(value.trim());
  if (!match) {
    throw new ConfigError([`canvas: expected WIDTHxHEIGHT, got "${value}"`]);
  }
  return { width: Number(match[1]), height: Number(match[2]) };
}
