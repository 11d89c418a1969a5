import {
  formatResolution,
  sameResolution,
  type BackendCapability,
  type CommandRunner,
  type FrameRange,
  type MediaBackend,
  type MediaProber,
  type MediaRequest,
  type Resolution,
  type SynthesisPlan,
  type SynthesisResult,
  type WriteNodeTables,
} from '../../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../../shared/logger/pino.js';
import { formatFrame, parseFramePattern } from '../../../shared/media/framePattern.js';

import { NkDocument } from './nk-document.js';
import { applyFrameRange, READ_NODE, renderScript, requireFrameRange, WRITE_NODE } from './nuke-script-runner.js';
import { createWriteConfigurator } from './write-node-configurators.js';

export interface NukeMediaBackendOptions {
  readonly nukePath?: string;
  readonly logger?: Logger;
}

/** First frame of a sequence, or the file itself for a single container. */
export function probeTarget(inputPath: string, range: FrameRange): string {
  const pattern = parseFramePattern(inputPath);
  return pattern ? formatFrame(pattern, range.first) : inputPath;
}

/**
 * Builds `Root → Read → [Resize] → Write`. A Resize node is added only when the
 * source size differs from the requested one, or when it cannot be probed.
 */
export function buildGraph(
  request: MediaRequest,
  range: FrameRange,
  sourceResolution: Resolution | null,
  writeNodes: WriteNodeTables,
  logger: Logger,
): NkDocument {
  const document = NkDocument.empty();
  const { width, height } = request.resolution;

  const rootKnobs: Array<readonly [string, string | number]> = [
    ['first_frame', range.first],
    ['last_frame', range.last],
    ['format', `${width} ${height} 0 0 ${width} ${height} 1 daily`],
  ];
  if (request.frameRate !== undefined) {
    rootKnobs.push(['fps', request.frameRate]);
  }
  document.addNode('Root', rootKnobs);

  applyFrameRange(
    document.addNode('Read', [
      ['inputs', 0],
      ['file', request.inputPath],
      ['name', READ_NODE],
    ]),
    range,
  );

  if (!sourceResolution || !sameResolution(sourceResolution, request.resolution)) {
    document.addNode('Resize', [
      ['resize', 'fit'],
      ['box_width', width],
      ['box_height', height],
      ['name', 'Resize1'],
    ]);
  }

  const write = document.addNode('Write', [
    ['file', request.outputPath],
    ['use_limit', true],
    ['name', WRITE_NODE],
  ]);
  applyFrameRange(write, range);

  const report = createWriteConfigurator(request.extension, writeNodes, logger).configure(
    write,
    request.options,
    request.frameRate,
  );
  if (report.skipped.length > 0) {
    logger.warn({ skipped: report.skipped, extension: request.extension }, 'Some options did not match a write knob');
  }

  return document;
}

export class NukeMediaBackend implements MediaBackend {
  public readonly kind = 'nuke';

  private readonly nukePath: string;

  private readonly logger: Logger;

  public constructor(
    public readonly capability: BackendCapability,
    private readonly runner: CommandRunner,
    private readonly prober: MediaProber,
    private readonly writeNodes: WriteNodeTables,
    options: NukeMediaBackendOptions = {},
  ) {
    this.nukePath = options.nukePath ?? 'nuke';
    this.logger = options.logger ?? createChildLogger({ module: 'NukeMediaBackend' });
  }

  public async synthesize(plan: SynthesisPlan): Promise<SynthesisResult> {
    const range = requireFrameRange(plan);
    const source = await this.probeSource(plan.request, range);

    const document = buildGraph(plan.request, range, source, this.writeNodes, this.logger);
    this.logger.info(
      { range: range.toString(), target: formatResolution(plan.request.resolution), resized: document.nodes.length > 3 },
      'Graph script built',
    );

    return renderScript(this.runner, this.nukePath, document, plan, 'graph', range);
  }

  private async probeSource(request: MediaRequest, range: FrameRange): Promise<Resolution | null> {
    const target = probeTarget(request.inputPath, range);
    try {
      const probe = await this.prober.probe(target);
      return { width: probe.width, height: probe.height };
    } catch (error) {
      this.logger.warn({ target, error }, 'Could not probe source size, resizing unconditionally');
      return null;
    }
  }
}
