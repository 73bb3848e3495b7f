import type { ReportSection } from '../../core/types.js';

/**
 * Render sections as plain text: each title followed by its lines, sections
 * separated by a blank line, output ending with a newline.
 */
export const renderReport = (sections: readonly ReportSection[]): string => {
  if (sections.length === 0) {
    return '';
  }

  const blocks = sections.map((section) => [section.title, ...section.lines].join('\n'));
  return `${blocks.join('\n\n')}\n`;
};
