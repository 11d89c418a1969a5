import { writeFile } from 'node:fs/promises';

import {
  MediaErrors,
  type CommandInvocation,
  type CommandRunner,
  type FrameRange,
  type SynthesisPlan,
  type SynthesisResult,
} from '../../../domain/media/index.js';

import { setKnob, type NkDocument, type NkNode } from './nk-document.js';

export const READ_NODE = 'Read1';
export const WRITE_NODE = 'Write1';

export function requireFrameRange(plan: SynthesisPlan): FrameRange {
  if (!plan.frameRange) {
    throw MediaErrors.frameRangeRequired(plan.request.backend, plan.request.inputPath);
  }
  return plan.frameRange;
}

export function applyFrameRange(node: NkNode, range: FrameRange): void {
  setKnob(node, 'first', range.first);
  setKnob(node, 'last', range.last);
}

export function buildNukeInvocation(binary: string, scriptPath: string, range: FrameRange): CommandInvocation {
  return {
    command: binary,
    args: ['-F', `${range.first}-${range.last}`, '-X', WRITE_NODE, '-x', scriptPath],
  };
}

/** Writes the script into scratch space and evaluates its Write node over the range. */
export async function renderScript(
  runner: CommandRunner,
  binary: string,
  document: NkDocument,
  plan: SynthesisPlan,
  stem: string,
  range: FrameRange,
): Promise<SynthesisResult> {
  const scriptPath = plan.scratch.file(stem, 'nk');
  await writeFile(scriptPath, document.serialize(), 'utf8');

  const invocation = buildNukeInvocation(binary, scriptPath, range);
  await runner.run(invocation);

  return { outputPath: plan.request.outputPath, artifacts: [scriptPath], invocation };
}
