import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import {
  formatResolution,
  MEDIA_BACKEND_KINDS,
  SLATE_DEFAULTS,
  SLATE_FIELDS,
  type MediaOptions,
  type OptionValue,
  type Resolution,
  type SlateField,
  type SlateSpec,
} from '../../../domain/media/index.js';

const RESOLUTION_PATTERN = /^(\d+)\s*[xX]\s*(\d+)$/;

export function parseResolution(text: string): Resolution | null {
  const match = RESOLUTION_PATTERN.exec(text.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { width: Number.parseInt(match[1], 10), height: Number.parseInt(match[2], 10) };
}

/** `a=1,b,c=x` → `{ a: '1', b: null, c: 'x' }`. Blank items are ignored. */
export function parseKeyValueList(text: string): Record<string, string | null> {
  const result: Record<string, string | null> = {};
  for (const item of text.split(',')) {
    const trimmed = item.trim();
    if (trimmed === '') continue;

    const separator = trimmed.indexOf('=');
    if (separator === -1) {
      result[trimmed] = null;
    } else {
      result[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
    }
  }
  return result;
}

function parseJsonOrList(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.startsWith('{')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return trimmed;
    }
  }
  return parseKeyValueList(trimmed);
}

const resolutionSchema = z.preprocess(
  (value) => (typeof value === 'string' ? parseResolution(value) ?? value : value),
  z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
);

const optionsSchema = z
  .preprocess(
    (value) => (typeof value === 'string' ? parseJsonOrList(value) : value),
    z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  )
  .transform((raw): MediaOptions => {
    // `true` means "flag present", `false` means "leave the flag out".
    const options: Record<string, OptionValue> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (value === false) continue;
      options[key] = value === true ? null : value;
    }
    return options;
  });

const slateFieldSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional();

const slateSchema = z.preprocess(
  (value) => (typeof value === 'string' ? parseJsonOrList(value) : value),
  z.object({
    version: slateFieldSchema,
    file: slateFieldSchema,
    description: slateFieldSchema,
    artist: slateFieldSchema,
    link: slateFieldSchema,
    task: slateFieldSchema,
    project: slateFieldSchema,
    resolution: slateFieldSchema,
    fps: slateFieldSchema,
  }),
);

export const createMediaCommandSchema = z
  .object({
    id: z.string().min(1).default(() => randomUUID()),
    backend: z.preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      z.enum(MEDIA_BACKEND_KINDS),
    ),
    inputPath: z.string().min(1),
    outputPath: z.string().min(1),
    resolution: resolutionSchema.default({ width: 1920, height: 1080 }),
    extension: z
      .string()
      .min(1)
      .transform((value) => value.replace(/^\./, '').toLowerCase())
      .default('mov'),
    frameRate: z.coerce.number().positive().default(30),
    options: optionsSchema.default({}),
    slate: slateSchema.optional(),
    templatePath: z.string().min(1).optional(),
  })
  .superRefine((payload, ctx) => {
    if (payload.backend === 'nuke-template' && !payload.templatePath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['templatePath'],
        message: 'The nuke-template backend needs a template path',
      });
    }
  });

export type CreateMediaInput = z.input<typeof createMediaCommandSchema>;

export type CreateMediaPayload = z.output<typeof createMediaCommandSchema>;

/** Fills the slate fields the caller left out. */
export function withSlateDefaults(slate: Partial<Record<SlateField, string | undefined>>, resolution: Resolution): SlateSpec {
  const filled: Partial<Record<SlateField, string>> = {
    ...SLATE_DEFAULTS,
    resolution: formatResolution(resolution),
  };
  for (const field of SLATE_FIELDS) {
    const value = slate[field];
    if (value !== undefined && value !== '') {
      filled[field] = value;
    }
  }
  return filled;
}
