import { describe, expect, it } from 'vitest';

import {
  buildReport,
  DEFAULT_REPORT_OPTIONS,
} from '@/modules/lego-sets/core/usecases/build-report.js';
import { makeLegoSet } from '@/tests/fixtures/builders.js';

const sets = [
  makeLegoSet({
    number: '1-1',
    name: 'Lava Tower',
    theme: 'Castle',
    subtheme: 'Lion Knights',
    tags: ['tower', 'knight'],
    pieces: 320,
    packagingType: 'Box',
  }),
  makeLegoSet({
    number: '2-1',
    name: 'Scout Ships',
    theme: 'Space',
    subtheme: null,
    tags: ['ship'],
    pieces: 90,
    packagingType: 'Polybag',
  }),
  makeLegoSet({
    number: '3-1',
    name: 'lava Lamp',
    theme: 'Castle',
    subtheme: null,
    tags: null,
    pieces: 610,
    packagingType: 'Box',
  }),
];

describe('buildReport', () => {
  it('uses the default options', () => {
    expect(DEFAULT_REPORT_OPTIONS).toEqual({ prefix: 'lava', maxTags: 5, pieceLimit: 500 });
  });

  it('collects every query result in print order', () => {
    expect(buildReport(sets)).toEqual([
      { title: 'LEGO set names starting with "lava":', lines: ['Lava Tower', 'lava Lamp'] },
      {
        title: 'LEGO set names with the same letter at the beginning and the end:',
        lines: ['Scout Ships'],
      },
      { title: 'LEGO set numbers with at most 5 tags:', lines: ['1-1', '2-1'] },
      { title: 'Packaging type summary:', lines: ['Box: 2', 'Polybag: 1'] },
      { title: 'Sum of all LEGO pieces:', lines: ['1020'] },
      { title: 'Do all sets have at most 500 pieces?', lines: ['no'] },
      { title: 'Sorted, distinct tags of sets that have no subtheme:', lines: ['ship'] },
      { title: 'Theme with the longest name:', lines: ['Castle'] },
      { title: 'Number of sets for each theme:', lines: ['Castle: 2', 'Space: 1'] },
      {
        title: 'Each theme with its distinct subthemes:',
        lines: ['Castle: Lion Knights', 'Space: (none)'],
      },
    ]);
  });

  it('applies option overrides to titles and queries', () => {
    const sections = buildReport(sets, { prefix: 'scout', maxTags: 1, pieceLimit: 1000 });

    expect(sections[0]).toEqual({
      title: 'LEGO set names starting with "scout":',
      lines: ['Scout Ships'],
    });
    expect(sections[2]).toEqual({
      title: 'LEGO set numbers with at most 1 tags:',
      lines: ['2-1'],
    });
    expect(sections[5]).toEqual({
      title: 'Do all sets have at most 1000 pieces?',
      lines: ['yes'],
    });
  });

  it('keeps every section for an empty collection', () => {
    const sections = buildReport([]);

    expect(sections).toHaveLength(10);
    expect(sections.map((section) => section.lines)).toEqual([
      [],
      [],
      [],
      [],
      [],
      ['yes'],
      [],
      [],
      [],
      [],
    ]);
  });
});
