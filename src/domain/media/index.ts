export * from './contracts/command-runner.js';
export * from './contracts/frame-range-source.js';
export * from './contracts/media-backend.js';
export * from './contracts/media-prober.js';
export * from './contracts/slate-renderer.js';
export * from './entities/media-request.js';
export * from './errors.js';
export * from './value-objects/capabilities.js';
export * from './value-objects/frame-range.js';
export * from './value-objects/media-options.js';
export * from './value-objects/slate-spec.js';
