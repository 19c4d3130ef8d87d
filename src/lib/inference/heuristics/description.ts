/**
 * Description generation for heuristic modules
 */

import { stripTags } from './heading-detectors';

export const DEFAULT_DESCRIPTION_LENGTH = 400;
export const SUBMODULE_DESCRIPTION_LENGTH = 300;

const MIN_SENTENCE_LENGTH = 10;
const MAX_SENTENCES = 2;
const FALLBACK_WORDS = 20;

/**
 * Section text with markup removed and the leading heading title cut off.
 * Line breaks are kept.
 */
export function sectionBody(section: string, title: string): string {
  const text = stripTags(section.replace(/<\/?(p|div|li|br|h[1-6])\b[^>]*>/gi, '\n'))
    .replace(/^\s*#{1,6}[ \t]*/, '')
    .trimStart();

  if (title && text.toLowerCase().startsWith(title.toLowerCase())) {
    return text.slice(title.length);
  }
  return text;
}

/**
 * Up to two sentences of at least ten characters from the section,
 * skipping any sentence equal to the title, within `maxLength` characters.
 * Falls back to the first twenty words.
 */
export function generateDescription(
  section: string,
  title: string,
  maxLength: number = DEFAULT_DESCRIPTION_LENGTH
): string {
  const clean = sectionBody(section, title).replace(/\s+/g, ' ').trim();
  if (!clean) {
    return '';
  }

  const titleKey = title.trim().toLowerCase();
  const parts: string[] = [];
  let length = 0;

  for (const raw of clean.split(/(?<=[.!?])\s+/)) {
    const sentence = raw.trim();
    if (sentence.length < MIN_SENTENCE_LENGTH || sentence.toLowerCase() === titleKey) {
      continue;
    }
    if (length + sentence.length + 1 > maxLength) {
      continue;
    }
    parts.push(sentence);
    length += sentence.length + 1;
    if (parts.length >= MAX_SENTENCES) break;
  }

  if (parts.length > 0) {
    return parts.join(' ');
  }

  return clean.split(' ').slice(0, FALLBACK_WORDS).join(' ').slice(0, maxLength).trim();
}

/**
 * First paragraph after a sub-heading, or the first 300 characters of
 * its section when there is no paragraph break.
 */
export function describeSubsection(snippet: string, title: string): string {
  const paragraphs = sectionBody(snippet, title)
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
    .filter(Boolean);

  if (paragraphs.length > 1) {
    return paragraphs[0];
  }
  return (paragraphs[0] ?? '').slice(0, SUBMODULE_DESCRIPTION_LENGTH);
}
