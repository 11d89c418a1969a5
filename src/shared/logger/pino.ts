import { pino, stdSerializers, type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

function buildRoot(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: 'dailies',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    // components log failures under `error`, not pino's default `err`
    serializers: { error: stdSerializers.err, err: stdSerializers.err },
  };
  return destination ? pino(options, destination) : pino(options);
}

let rootLogger: Logger = buildRoot(process.env.LOG_LEVEL ?? 'info');

/**
 * Reconfigures the process-wide logger. Call once from the entry point before
 * any component is constructed; children created earlier keep the old root.
 */
export function configureLogger(level: LevelWithSilent, destination?: DestinationStream): Logger {
  rootLogger = buildRoot(level, destination);
  return rootLogger;
}

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return rootLogger.child(bindings);
}
