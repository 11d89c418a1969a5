import { readFile } from 'node:fs/promises';

import {
  MediaErrors,
  type BackendCapability,
  type CommandRunner,
  type MediaBackend,
  type SynthesisPlan,
  type SynthesisResult,
} from '../../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../../shared/logger/pino.js';
import { extensionOf } from '../../../shared/media/framePattern.js';

import { getKnob, NkDocument, NkSyntaxError, setKnob } from './nk-document.js';
import { applyFrameRange, READ_NODE, renderScript, requireFrameRange, WRITE_NODE } from './nuke-script-runner.js';

export function parseTemplate(templatePath: string, source: string): NkDocument {
  let document: NkDocument;
  try {
    document = NkDocument.parse(source);
  } catch (error) {
    if (error instanceof NkSyntaxError) {
      throw MediaErrors.templateInvalid(templatePath, `${error.message} at offset ${error.offset}`);
    }
    throw error;
  }

  if (document.nodes.length === 0) {
    throw MediaErrors.templateInvalid(templatePath, 'script contains no nodes');
  }

  return document;
}

export interface NukeTemplateMediaBackendOptions {
  readonly nukePath?: string;
  readonly logger?: Logger;
}

/**
 * Renders through a pre-authored script: only the Read1/Write1 file paths and
 * the frame range are rebound, every other setting comes from the template.
 */
export class NukeTemplateMediaBackend implements MediaBackend {
  public readonly kind = 'nuke-template';

  private readonly nukePath: string;

  private readonly logger: Logger;

  public constructor(
    public readonly capability: BackendCapability,
    private readonly runner: CommandRunner,
    options: NukeTemplateMediaBackendOptions = {},
  ) {
    this.nukePath = options.nukePath ?? 'nuke';
    this.logger = options.logger ?? createChildLogger({ module: 'NukeTemplateMediaBackend' });
  }

  public async synthesize(plan: SynthesisPlan): Promise<SynthesisResult> {
    const { request } = plan;
    const templatePath = request.templatePath;
    if (!templatePath) {
      throw MediaErrors.templateRequired(this.kind);
    }

    const document = await this.openTemplate(templatePath);
    const read = document.findNode(READ_NODE);
    if (!read) {
      throw MediaErrors.templateNodeMissing(templatePath, READ_NODE);
    }
    const write = document.findNode(WRITE_NODE);
    if (!write) {
      throw MediaErrors.templateNodeMissing(templatePath, WRITE_NODE);
    }

    const range = requireFrameRange(plan);
    const authored = { read: getKnob(read, 'file') ?? null, write: getKnob(write, 'file') ?? null };
    setKnob(read, 'file', request.inputPath);
    applyFrameRange(read, range);
    setKnob(write, 'file', request.outputPath);
    applyFrameRange(write, range);
    setKnob(write, 'use_limit', true);

    const root = document.nodes.find((node) => node.className === 'Root');
    if (root) {
      setKnob(root, 'first_frame', range.first);
      setKnob(root, 'last_frame', range.last);
    }

    this.logger.info({ templatePath, range: range.toString(), authored }, 'Template rebound');
    return renderScript(this.runner, this.nukePath, document, plan, 'template', range);
  }

  private async openTemplate(templatePath: string): Promise<NkDocument> {
    if (extensionOf(templatePath) !== 'nk') {
      throw MediaErrors.templateInvalid(templatePath, 'not a .nk script');
    }

    let source: string;
    try {
      source = await readFile(templatePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw MediaErrors.templateInvalid(templatePath, `unreadable (${reason})`);
    }

    return parseTemplate(templatePath, source);
  }
}
