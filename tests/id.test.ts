import { describe, expect, it } from 'vitest';

import { isValidTaskId, parseTaskId, TaskIdGenerator } from '../src/utils/id.js';

describe('task id', () => {
  it('prefixes the project and falls back to ns', () => {
    const gen = new TaskIdGenerator((n) => Buffer.alloc(n, 0xab));
    expect(gen.next('web')).toBe('web-abababab');
    expect(gen.next(null)).toBe('ns-abababab');
    expect(gen.next('not valid')).toBe('ns-abababab');
  });

  it('parses generated ids back into parts', () => {
    const id = new TaskIdGenerator().next('api');
    expect(parseTaskId(id)).toEqual({ prefix: 'api', hex: id.slice(4) });
    expect(parseTaskId('handwritten')).toBeNull();
    expect(isValidTaskId('bad id')).toBe(false);
  });
});
