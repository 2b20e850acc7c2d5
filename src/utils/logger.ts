/**
 * Application logger (pino)
 */

import pino from 'pino';
import { config } from '../config/index.js';

function buildTargets(): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];

  if (config.app.env === 'production') {
    targets.push({ target: 'pino/file', level: config.logging.level, options: { destination: 1 } });
  } else {
    targets.push({
      target: 'pino-pretty',
      level: config.logging.level,
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' },
    });
  }

  if (config.logging.file) {
    targets.push({
      target: 'pino/file',
      level: config.logging.level,
      options: { destination: config.logging.file, mkdir: true },
    });
  }

  return targets;
}

const isTest = config.app.env === 'test';

export const logger = isTest
  ? pino({ enabled: false })
  : pino(
      {
        name: config.app.name,
        level: config.logging.level,
      },
      pino.transport({ targets: buildTargets() })
    );

export type Logger = typeof logger;
