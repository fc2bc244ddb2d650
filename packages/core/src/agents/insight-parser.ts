import type {
  InsightPayload,
  InsightSection,
  ResponseFormat,
} from '@hemascope/shared/src/types/analysis.types.js';

const MARKDOWN_HEADING = /^\s{0,3}#{1,3}\s+(.+?)\s*#*\s*$/;
const BOLD_HEADING = /^\s*\*\*([^*]+?)\*\*:?\s*$/;

export function toSectionKey(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function cleanTitle(raw: string): string {
  return raw.replace(/\*\*/g, '').replace(/:\s*$/, '').trim();
}

function matchHeading(line: string): string | undefined {
  const match = MARKDOWN_HEADING.exec(line) ?? BOLD_HEADING.exec(line);
  if (!match?.[1]) {
    return undefined;
  }
  const title = cleanTitle(match[1]);
  return title === '' ? undefined : title;
}

interface OpenSection {
  readonly title: string;
  readonly lines: string[];
}

/**
 * Splits a model response into its headed sections. Headings are matched
 * against the expected titles case-insensitively; unknown headings are kept.
 */
export function parseInsight(
  content: string,
  responseFormat: ResponseFormat,
  expectedSections: readonly string[],
): InsightPayload {
  const text = content.trim();

  if (responseFormat === 'free_text') {
    return { format: 'free_text', text };
  }

  const canonical = new Map(expectedSections.map((title) => [toSectionKey(title), title]));
  const open: OpenSection[] = [];

  for (const line of text.split(/\r?\n/)) {
    const heading = matchHeading(line);
    if (heading !== undefined) {
      open.push({ title: heading, lines: [] });
      continue;
    }
    open.at(-1)?.lines.push(line);
  }

  const sections: InsightSection[] = open.map((section) => {
    const key = toSectionKey(section.title);
    return {
      key,
      title: canonical.get(key) ?? section.title,
      content: section.lines.join('\n').trim(),
    };
  });

  const found = new Set(sections.map((section) => section.key));
  const missingSections = expectedSections.filter((title) => !found.has(toSectionKey(title)));

  return { format: 'sections', sections, missingSections, text };
}
