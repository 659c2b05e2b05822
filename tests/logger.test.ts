import { describe, expect, it } from 'vitest';

import { createLogger, Logger } from '../src/utils/logger.js';

describe('logger', () => {
  it('filters below the configured level and prefixes the scope', () => {
    const lines: string[] = [];
    const log = new Logger({ level: 'warn', sink: (l) => lines.push(l) }).child('store').child('fs');
    log.info('hidden');
    log.warn('index refresh failed', { id: 'a' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+Z warn \[store\.fs\] index refresh failed \{"id":"a"\}$/);
  });

  it('reads level and JSON mode from the environment', () => {
    const lines: string[] = [];
    const log = createLogger({ TRELLIS_LOG_LEVEL: 'DEBUG', TRELLIS_LOG_JSON: '1' }, { sink: (l) => lines.push(l), scope: 'merge' });
    log.debug('stage', { stage: 'verify' });

    const parsed: unknown = JSON.parse(lines[0]);
    expect(parsed).toMatchObject({ level: 'debug', scope: 'merge', message: 'stage', data: { stage: 'verify' } });
  });
});
