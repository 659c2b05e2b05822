import { describe, expect, it } from 'vitest';

import { parseHandover } from '../src/core/gate/handover.js';

describe('handover', () => {
  it('accepts a complete section with multi-line fields', () => {
    const text = [
      'Work summary above.',
      '',
      '## Handover',
      '**Outcome**: success',
      '**Accomplishments**:',
      '- wired the parser',
      '- added tests',
      '**Next step**: review'
    ].join('\n');

    expect(parseHandover(text)).toEqual({
      ok: true,
      fields: {
        Outcome: 'success',
        Accomplishments: '- wired the parser\n- added tests',
        'Next step': 'review'
      }
    });
  });

  it('reports missing fields', () => {
    expect(parseHandover('## Handover\n**Outcome**: partial\n**Accomplishments**: none')).toEqual({
      ok: false,
      sectionFound: true,
      missing: ['Next step']
    });
  });

  it('stops the section at the next heading of the same level', () => {
    const text = '## Handover\n**Outcome**: done\n## Notes\n**Accomplishments**: x\n**Next step**: y';
    expect(parseHandover(text)).toEqual({ ok: false, sectionFound: true, missing: ['Accomplishments', 'Next step'] });
  });

  it('reports a missing section', () => {
    expect(parseHandover('all done')).toEqual({
      ok: false,
      sectionFound: false,
      missing: ['Outcome', 'Accomplishments', 'Next step']
    });
  });
});
