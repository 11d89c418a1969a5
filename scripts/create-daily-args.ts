import path from 'node:path';

import type { CreateMediaInput } from '../src/application/media/index.js';

export interface IdentityOverrides {
  project?: string;
  entity?: string;
  entityType?: string;
  task?: string;
  artist?: string;
}

export interface CreateDailyArgs {
  media: CreateMediaInput;
  tracking?: string;
  versionName?: string;
  comment: string;
  identity: IdentityOverrides;
}

export const USAGE = [
  'Usage: create-daily --backend <ffmpeg|nuke|nuke-template> --input <path> --output <path>',
  '  [--extension mov] [--resolution 1920x1080] [--fps 30]',
  '  [--options <json|key=value,...>] [--slate <json|key=value,...>] [--template <file.nk>]',
  '  [--tracking <shotgun|ftrack|kitsu|flow> --version-name <name> --comment <text>]',
  '  [--project <name>] [--entity <name>] [--entity-type <shot|sequence|asset>] [--task <name>] [--artist <name>]',
].join('\n');

export function parseCreateDailyArgs(argv: readonly string[]): CreateDailyArgs {
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg ?? ''}\n${USAGE}`);
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`Missing value for ${arg}\n${USAGE}`);
    }

    switch (arg) {
      case '--backend':
      case '--input':
      case '--output':
      case '--extension':
      case '--resolution':
      case '--fps':
      case '--options':
      case '--slate':
      case '--template':
      case '--tracking':
      case '--version-name':
      case '--comment':
      case '--project':
      case '--entity':
      case '--entity-type':
      case '--task':
      case '--artist':
        values.set(arg.slice(2), next);
        i += 1;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    }
  }

  const backend = values.get('backend');
  const input = values.get('input');
  const output = values.get('output');
  if (!backend || !input || !output) {
    throw new Error(USAGE);
  }

  const fps = values.get('fps');
  const media: CreateMediaInput = {
    backend,
    inputPath: path.resolve(input),
    outputPath: path.resolve(output),
    extension: values.get('extension'),
    resolution: values.get('resolution'),
    frameRate: fps === undefined ? undefined : Number(fps),
    options: values.get('options'),
    slate: values.get('slate'),
    templatePath: values.get('template'),
  };

  return {
    media,
    tracking: values.get('tracking'),
    versionName: values.get('version-name'),
    comment: values.get('comment') ?? '',
    identity: {
      project: values.get('project'),
      entity: values.get('entity'),
      entityType: values.get('entity-type'),
      task: values.get('task'),
      artist: values.get('artist'),
    },
  };
}

/** `--version-name` wins, otherwise the output file stem without its frame placeholder. */
export function defaultVersionName(outputPath: string, explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  return path.basename(outputPath, path.extname(outputPath)).replace(/[._]?%0?\d*d$|[._]?#+$/, '');
}
