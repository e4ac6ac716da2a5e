import pino from 'pino';
import pretty from 'pino-pretty';

export const getLogger = () => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'cached-fs',
      environment,
    },
  };

  if (!isProduction) {
    // Pretty output goes to stderr so it never mixes with file content printed on stdout
    const prettyStream = pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
      destination: process.stderr,
    });

    return pino(loggerConfig, prettyStream);
  }

  return pino(loggerConfig);
};

export type Logger = ReturnType<typeof getLogger>;
