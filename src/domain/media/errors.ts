import { AppError } from '../../shared/errors/app-error.js';
import { formatInvocation, type CommandInvocation } from './contracts/command-runner.js';

export const MEDIA_ERROR_CODES = {
  inputNotFound: 'media.input-not-found',
  unsupportedExtension: 'media.unsupported-extension',
  unsupportedOption: 'media.unsupported-option',
  sequenceNotFound: 'media.sequence-not-found',
  slateRenderFailed: 'media.slate-render-failed',
  backendUnavailable: 'media.backend-unavailable',
  executionFailed: 'media.execution-failed',
  templateInvalid: 'media.template-invalid',
  templateNodeMissing: 'media.template-node-missing',
  templateRequired: 'media.template-required',
  frameRangeRequired: 'media.frame-range-required',
  unknownBackend: 'media.unknown-backend',
} as const;

export type MediaErrorCode = (typeof MEDIA_ERROR_CODES)[keyof typeof MEDIA_ERROR_CODES];

export const MediaErrors = {
  inputNotFound(inputPath: string, checkedPath: string): AppError {
    return AppError.of(MEDIA_ERROR_CODES.inputNotFound, `Input file not found: ${checkedPath}`, {
      inputPath,
      checkedPath,
    });
  },

  unsupportedExtension(backend: string, extension: string, supported: readonly string[]): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.unsupportedExtension,
      `Extension '${extension}' is not supported by the ${backend} backend`,
      { backend, extension, supported },
    );
  },

  unsupportedOption(backend: string, extension: string): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.unsupportedOption,
      `No codec profile for '${extension}' on the ${backend} backend`,
      { backend, extension },
    );
  },

  sequenceNotFound(pattern: string, scanned: { from: number; to: number }): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.sequenceNotFound,
      `No frames found for sequence ${pattern}`,
      { pattern, scanned },
    );
  },

  slateRenderFailed(outputPath: string, cause: unknown): AppError {
    const detail = cause instanceof AppError ? cause.metadata : {};
    return AppError.of(
      MEDIA_ERROR_CODES.slateRenderFailed,
      `Failed to render slate frame at ${outputPath}`,
      { outputPath, ...detail },
      cause,
    );
  },

  backendUnavailable(invocation: CommandInvocation, cause?: unknown): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.backendUnavailable,
      `${invocation.command} binary not found. Install it or point the matching *_PATH variable at it.`,
      { command: formatInvocation(invocation) },
      cause,
    );
  },

  executionFailed(message: string, metadata: Record<string, unknown>, cause?: unknown): AppError {
    return AppError.of(MEDIA_ERROR_CODES.executionFailed, message, metadata, cause);
  },

  templateInvalid(templatePath: string, reason: string): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.templateInvalid,
      `Invalid graph template '${templatePath}': ${reason}`,
      { templatePath, reason },
    );
  },

  templateNodeMissing(templatePath: string, node: string): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.templateNodeMissing,
      `${node} node not found in template ${templatePath}`,
      { templatePath, node },
    );
  },

  templateRequired(backend: string): AppError {
    return AppError.validation(MEDIA_ERROR_CODES.templateRequired, { backend, field: 'templatePath' });
  },

  frameRangeRequired(backend: string, inputPath: string): AppError {
    return AppError.of(
      MEDIA_ERROR_CODES.frameRangeRequired,
      `The ${backend} backend needs a frame range for ${inputPath}`,
      { backend, inputPath },
    );
  },

  unknownBackend(name: string, known: readonly string[]): AppError {
    return AppError.of(MEDIA_ERROR_CODES.unknownBackend, `Unsupported media backend: ${name}`, {
      name,
      known,
    });
  },
};
