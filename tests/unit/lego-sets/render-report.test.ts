import { describe, expect, it } from 'vitest';

import { renderReport } from '@/modules/lego-sets/shell/console/render-report.js';

describe('renderReport', () => {
  it('prints titles and lines with a blank line between sections', () => {
    const output = renderReport([
      { title: 'Sum of all LEGO pieces:', lines: ['1020'] },
      { title: 'Number of sets for each theme:', lines: ['Castle: 2', 'Space: 1'] },
    ]);

    expect(output).toBe(
      'Sum of all LEGO pieces:\n1020\n\nNumber of sets for each theme:\nCastle: 2\nSpace: 1\n'
    );
  });

  it('prints only the title of an empty section', () => {
    expect(renderReport([{ title: 'Theme with the longest name:', lines: [] }])).toBe(
      'Theme with the longest name:\n'
    );
  });

  it('prints nothing without sections', () => {
    expect(renderReport([])).toBe('');
  });
});
