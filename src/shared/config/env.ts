import os from 'node:os';

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Scratch space and sequence conventions
  DAILIES_TMP_DIR: z.string().min(1).default(os.tmpdir()),
  DAILIES_FRAME_START: z.coerce.number().int().min(0).default(1),
  DAILIES_FRAME_SCAN_LIMIT: z.coerce.number().int().positive().default(999),
  DAILIES_CAPABILITIES_PATH: z.string().min(1).optional(),

  // External binaries
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  NUKE_PATH: z.string().min(1).default('nuke'),

  // Slate
  DAILIES_SLATE_FONT: z.string().min(1).optional(),
  DAILIES_SLATE_FONT_SIZE: z.coerce.number().int().positive().default(18),
  DAILIES_SLATE_SPACING: z.coerce.number().int().min(0).default(8),

  // Tracking
  TRACKING_BACKEND: z.string().min(1).default('shotgun'),
  TRACKING_URL: z.string().url().optional(),
  TRACKING_LOGIN: z.string().min(1).optional(),
  TRACKING_PASSWORD: z.string().min(1).optional(),
});

export type PipelineEnv = z.infer<typeof EnvSchema>;

export interface PipelineConfig {
  readonly logLevel: PipelineEnv['LOG_LEVEL'];
  readonly scratch: {
    readonly baseDirectory: string;
  };
  readonly sequence: {
    readonly startFrame: number;
    readonly scanLimit: number;
  };
  readonly capabilitiesPath?: string;
  readonly binaries: {
    readonly ffmpeg: string;
    readonly ffprobe: string;
    readonly nuke: string;
  };
  readonly slate: {
    readonly fontFile?: string;
    readonly fontSize: number;
    readonly spacing: number;
  };
  readonly tracking: {
    readonly backend: string;
    readonly url?: string;
    readonly login?: string;
    readonly password?: string;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv): PipelineConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }

  const env = parsed.data;
  return {
    logLevel: env.LOG_LEVEL,
    scratch: { baseDirectory: env.DAILIES_TMP_DIR },
    sequence: { startFrame: env.DAILIES_FRAME_START, scanLimit: env.DAILIES_FRAME_SCAN_LIMIT },
    capabilitiesPath: env.DAILIES_CAPABILITIES_PATH,
    binaries: { ffmpeg: env.FFMPEG_PATH, ffprobe: env.FFPROBE_PATH, nuke: env.NUKE_PATH },
    slate: {
      fontFile: env.DAILIES_SLATE_FONT,
      fontSize: env.DAILIES_SLATE_FONT_SIZE,
      spacing: env.DAILIES_SLATE_SPACING,
    },
    tracking: {
      backend: env.TRACKING_BACKEND,
      url: env.TRACKING_URL,
      login: env.TRACKING_LOGIN,
      password: env.TRACKING_PASSWORD,
    },
  };
}

/** Reads `.env` into `process.env` (without overriding) and parses the result. */
export function loadConfigFromProcess(): PipelineConfig {
  dotenvConfig();
  return loadConfig(process.env);
}
