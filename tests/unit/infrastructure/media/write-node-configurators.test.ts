import { describe, expect, test } from 'vitest';

import type { WriteNodeTables } from '../../../../src/domain/media/index.js';
import { getKnob, NkDocument } from '../../../../src/infrastructure/media/nuke/nk-document.js';
import { coerceKnobValue, createWriteConfigurator } from '../../../../src/infrastructure/media/nuke/write-node-configurators.js';

import { silentLogger } from './fakes.js';

const tables: WriteNodeTables = {
  common: ['channels', 'colorspace'],
  formats: {
    mov: { fileType: 'mov', frameRateKnob: 'mov64_fps', knobs: ['mov64_codec', 'mov64_fps', 'mov64_quality'] },
    exr: { fileType: 'exr', knobs: ['compression'] },
  },
};

function writeNode() {
  return NkDocument.empty().addNode('Write', [
    ['file', '/out/sh010.mov'],
    ['name', 'Write1'],
  ]);
}

describe('coerceKnobValue', () => {
  test('turns bare flags into enabled checkboxes', () => {
    expect(coerceKnobValue(null)).toBe(true);
  });

  test('turns digit-only strings into integers', () => {
    expect(coerceKnobValue('12')).toBe(12);
    expect(coerceKnobValue('1.5')).toBe('1.5');
    expect(coerceKnobValue('rgba')).toBe('rgba');
    expect(coerceKnobValue(3)).toBe(3);
  });
});

describe('WriteNodeConfigurator', () => {
  test('sets file type, frame rate and known knobs', () => {
    const node = writeNode();
    const report = createWriteConfigurator('mov', tables, silentLogger).configure(
      node,
      { mov64_codec: 'h264', mov64_quality: '3', channels: 'rgba' },
      24,
    );

    expect(report).toEqual({ applied: ['mov64_codec', 'mov64_quality', 'channels'], skipped: [] });
    expect(node.knobs).toEqual([
      { name: 'file', value: '/out/sh010.mov' },
      { name: 'file_type', value: 'mov' },
      { name: 'mov64_fps', value: '24' },
      { name: 'mov64_codec', value: 'h264' },
      { name: 'mov64_quality', value: '3' },
      { name: 'channels', value: 'rgba' },
      { name: 'name', value: 'Write1' },
    ]);
  });

  test('skips knobs the format does not expose', () => {
    const node = writeNode();
    const report = createWriteConfigurator('exr', tables, silentLogger).configure(node, {
      compression: 'Zip (1 scanline)',
      mov64_codec: 'h264',
    });

    expect(report.skipped).toEqual(['mov64_codec']);
    expect(getKnob(node, 'compression')).toBe('Zip (1 scanline)');
    expect(getKnob(node, 'mov64_codec')).toBeUndefined();
  });

  test('a format without a frame-rate knob ignores the rate', () => {
    const node = writeNode();
    createWriteConfigurator('exr', tables, silentLogger).configure(node, {}, 24);

    expect(node.knobs.map((knob) => knob.name)).toEqual(['file', 'file_type', 'name']);
  });

  test('unlisted formats only get a file type', () => {
    const node = writeNode();
    const configurator = createWriteConfigurator('cin', tables, silentLogger);
    const report = configurator.configure(node, { channels: 'rgb' }, 24);

    expect(configurator.fileType).toBe('cin');
    expect(report.skipped).toEqual(['channels']);
    expect(getKnob(node, 'file_type')).toBe('cin');
  });
});
