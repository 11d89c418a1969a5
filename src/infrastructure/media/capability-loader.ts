import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { CapabilityTables } from '../../domain/media/index.js';
import { AppError } from '../../shared/errors/app-error.js';

const extensionList = z.array(z.string().regex(/^[a-z0-9]+$/));

const backendCapabilitySchema = z.object({
  extensions: extensionList.min(1),
  slate: z.boolean(),
  frameRange: z.boolean(),
});

const encodingProfileSchema = z.object({
  codec: z.string().min(1),
  pixelFormat: z.string().min(1),
});

const capabilityTablesSchema = z.object({
  backends: z.object({
    ffmpeg: backendCapabilitySchema,
    nuke: backendCapabilitySchema,
    'nuke-template': backendCapabilitySchema,
  }),
  codecs: z
    .object({
      ffmpeg: z.record(encodingProfileSchema),
      nuke: z.record(encodingProfileSchema),
      'nuke-template': z.record(encodingProfileSchema),
    })
    .partial(),
  sequenceExtensions: extensionList,
  videoExtensions: extensionList,
  writeNodes: z.object({
    common: z.array(z.string().min(1)),
    formats: z.record(
      z.object({
        fileType: z.string().min(1),
        frameRateKnob: z.string().min(1).optional(),
        knobs: z.array(z.string().min(1)),
      }),
    ),
  }),
});

const CAPABILITIES_FILE = path.join('config', 'capabilities.json');

/**
 * Walks up from this module until it finds the package root, so the lookup
 * works both from `src/` and from the compiled `dist/src/`.
 */
export function defaultCapabilitiesPath(): string {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    if (existsSync(path.join(directory, 'package.json'))) {
      return path.join(directory, CAPABILITIES_FILE);
    }

    const parent = path.dirname(directory);
    if (parent === directory) {
      throw AppError.of('config.capabilities-not-found', 'Could not locate the package root for capability tables', {
        from: fileURLToPath(import.meta.url),
      });
    }
    directory = parent;
  }
}

export function parseCapabilityTables(raw: unknown, source = '<inline>'): CapabilityTables {
  const parsed = capabilityTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.validation('config.capabilities-invalid', {
      source,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

export function loadCapabilityTables(filePath: string = defaultCapabilitiesPath()): CapabilityTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw AppError.of('config.capabilities-unreadable', `Cannot read capability tables from ${filePath}`, { filePath }, error);
  }

  return parseCapabilityTables(raw, filePath);
}
