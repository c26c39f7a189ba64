// Pull structured lists out of the free-text analysis returned by the language model

import { ANALYSIS_SECTIONS } from './prompts.js';

export const DEFAULT_APPROACH = 'Approach with value-focused messaging';
const MAX_ITEMS = 5;

export interface ParsedAnalysis {
  keyChallenges: string[];
  opportunities: string[];
  recommendedApproach: string;
}

/** Non-empty, non-heading lines between `start` and the next `end` heading */
function sectionLines(text: string, start: string, end?: string): string[] | null {
  const at = text.indexOf(start);
  if (at < 0) return null;
  let section = text.slice(at + start.length);
  if (end) {
    const stop = section.indexOf(end);
    if (stop >= 0) section = section.slice(0, stop);
  }
  return section
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/** "2) **Legacy systems**" → "Legacy systems" */
export function stripListMarker(line: string): string {
  return line
    .replace(/^[\s\d.\-)*•:]+/, '')
    .replace(/\*+$/, '')
    .replace(/\*\*/g, '')
    .trim();
}

function items(text: string, start: string, end: string): string[] {
  return (sectionLines(text, start, end) ?? [])
    .map(stripListMarker)
    .filter(Boolean)
    .slice(0, MAX_ITEMS);
}

export function parseAnalysis(text: string): ParsedAnalysis {
  const approachLines = (sectionLines(text, ANALYSIS_SECTIONS.approach) ?? [])
    .map(stripListMarker)
    .filter(Boolean);

  return {
    keyChallenges: items(text, ANALYSIS_SECTIONS.challenges, ANALYSIS_SECTIONS.opportunities),
    opportunities: items(text, ANALYSIS_SECTIONS.opportunities, 'RECOMMENDED'),
    recommendedApproach: approachLines.length > 0
      ? approachLines.slice(0, 3).join(' ')
      : DEFAULT_APPROACH,
  };
}
