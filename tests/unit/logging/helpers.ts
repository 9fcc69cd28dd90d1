import winston from 'winston';

export interface CapturedRecord {
  level: string;
  message: unknown;
  component: unknown;
  errorStack: unknown;
  metadata: Record<string, unknown>;
}

/**
 * Root winston logger whose format captures each record; its only transport is silent.
 */
export function createCapturingRoot(): { root: winston.Logger; records: CapturedRecord[] } {
  const records: CapturedRecord[] = [];
  const capture = winston.format((info) => {
    const metadata: Record<string, unknown> = {};
    for (const key of Object.keys(info)) {
      if (!['level', 'message', 'component', 'errorStack'].includes(key)) {
        metadata[key] = info[key];
      }
    }
    records.push({
      level: info.level,
      message: info.message,
      component: info['component'],
      errorStack: info['errorStack'],
      metadata,
    });
    return info;
  });

  const root = winston.createLogger({
    levels: { error: 0, warn: 1, info: 2, debug: 3, trace: 4 },
    level: 'trace',
    format: capture(),
    transports: [new winston.transports.Console({ silent: true })],
  });
  return { root, records };
}
