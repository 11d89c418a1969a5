export const SLATE_FIELDS = [
  'version',
  'file',
  'description',
  'artist',
  'link',
  'task',
  'project',
  'resolution',
  'fps',
] as const;

export type SlateField = (typeof SLATE_FIELDS)[number];

/**
 * Text carried by a slate frame. `resolution` is the `WIDTHxHEIGHT` label
 * printed on the slate, not the canvas size.
 */
export type SlateSpec = Readonly<Partial<Record<SlateField, string>>>;

export const SLATE_DEFAULTS: SlateSpec = {
  artist: 'Unknown Artist',
  project: 'Unnamed Project',
  fps: '24 FPS',
  version: 'v001',
};
