import { SummarizationError } from '../errors/news.errors';
import { SectionHeaders } from '../prompts/summary.prompt';
import { SummarySection } from '../types/news.types';

interface HeaderMatch {
  start: number;
  end: number;
}

/**
 * Reads the two labelled sections out of a model reply. Headers may appear as
 * `【Name】`, `[Name]` or a `Name:` line; a section runs until the next header
 * (or the next `【`) and otherwise to the end of the text.
 */
export function extractSections(
  text: string,
  headers: SectionHeaders,
): SummarySection {
  const source = (text ?? '').replace(/\r\n?/g, '\n');
  const watch = findHeader(source, headers.watchPoints);
  const takeaway = findHeader(source, headers.takeaway, watch?.end ?? 0);

  if (!watch && !takeaway) {
    throw new SummarizationError(
      `expected section headers "${headers.watchPoints}" and "${headers.takeaway}" not found`,
    );
  }
  if (!watch) {
    throw new SummarizationError(
      `section header "${headers.watchPoints}" not found`,
    );
  }
  if (!takeaway) {
    throw new SummarizationError(
      `section header "${headers.takeaway}" not found`,
    );
  }

  const watchPoints = sliceBody(source, watch, [takeaway]);
  const takeawayText = sliceBody(source, takeaway, [watch]);
  if (!watchPoints) {
    throw new SummarizationError(`section "${headers.watchPoints}" is empty`);
  }
  if (!takeawayText) {
    throw new SummarizationError(`section "${headers.takeaway}" is empty`);
  }

  return { watchPoints, takeaway: takeawayText };
}

function findHeader(
  text: string,
  name: string,
  fromIndex = 0,
): HeaderMatch | null {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const patterns = [
    new RegExp(`【\\s*${escaped}\\s*】`, 'gi'),
    new RegExp(`\\[\\s*${escaped}\\s*\\]`, 'gi'),
    new RegExp(`(?:^|\\n)[ \\t]*(?:#+[ \\t]*)?\\**${escaped}\\**[ \\t]*[:：]`, 'gi'),
  ];

  for (const pattern of patterns) {
    pattern.lastIndex = fromIndex;
    const match = pattern.exec(text);
    if (match) {
      return { start: match.index, end: match.index + match[0].length };
    }
  }
  if (fromIndex > 0) {
    // the takeaway header may precede the list in a reordered reply
    return findHeader(text, name, 0);
  }
  return null;
}

function sliceBody(
  text: string,
  header: HeaderMatch,
  others: HeaderMatch[],
): string {
  const candidates = others
    .map((other) => other.start)
    .filter((start) => start >= header.end);
  const nextBracket = text.indexOf('【', header.end);
  if (nextBracket !== -1) {
    candidates.push(nextBracket);
  }
  const stop = candidates.length > 0 ? Math.min(...candidates) : text.length;
  return text.slice(header.end, stop).trim();
}
