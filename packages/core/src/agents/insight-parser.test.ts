import { describe, it, expect } from 'vitest';
import { parseInsight, toSectionKey } from './insight-parser.js';

const expected = ['Summary', 'Key Findings', 'Follow-up'];

describe('toSectionKey', () => {
  it('should slugify titles', () => {
    expect(toSectionKey('Key Findings')).toBe('key-findings');
    expect(toSectionKey(' Follow-up! ')).toBe('follow-up');
  });
});

describe('parseInsight', () => {
  it('should split markdown headings into sections', () => {
    const content = [
      '## Summary',
      'Values are mostly normal.',
      '',
      '### key findings:',
      '- LDL is high',
      '- HDL is low',
      '## Follow-up',
      'Repeat in 3 months.',
    ].join('\n');

    const insight = parseInsight(content, 'sections', expected);

    expect(insight).toEqual({
      format: 'sections',
      sections: [
        { key: 'summary', title: 'Summary', content: 'Values are mostly normal.' },
        { key: 'key-findings', title: 'Key Findings', content: '- LDL is high\n- HDL is low' },
        { key: 'follow-up', title: 'Follow-up', content: 'Repeat in 3 months.' },
      ],
      missingSections: [],
      text: content,
    });
  });

  it('should accept bold headings and keep unknown sections', () => {
    const content = '**Summary:**\nFine.\n# Lifestyle Notes\nSleep more.';

    const insight = parseInsight(content, 'sections', expected);

    expect(insight.format).toBe('sections');
    if (insight.format !== 'sections') return;
    expect(insight.sections).toEqual([
      { key: 'summary', title: 'Summary', content: 'Fine.' },
      { key: 'lifestyle-notes', title: 'Lifestyle Notes', content: 'Sleep more.' },
    ]);
    expect(insight.missingSections).toEqual(['Key Findings', 'Follow-up']);
  });

  it('should report every section missing when the response has no headings', () => {
    const insight = parseInsight('  Just a paragraph.  ', 'sections', expected);

    expect(insight).toEqual({
      format: 'sections',
      sections: [],
      missingSections: expected,
      text: 'Just a paragraph.',
    });
  });

  it('should pass free text through trimmed', () => {
    expect(parseInsight('\n## Summary\nok\n', 'free_text', expected)).toEqual({
      format: 'free_text',
      text: '## Summary\nok',
    });
  });

  it('should return identical payloads for identical input', () => {
    const content = '## Summary\nSame.';

    expect(JSON.stringify(parseInsight(content, 'sections', expected))).toBe(
      JSON.stringify(parseInsight(content, 'sections', expected)),
    );
  });
});
