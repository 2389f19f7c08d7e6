/**
 * Audience tags and the canonical description string
 *
 * The description "Semester: <tag> | Branch: <branch>" is the only channel
 * through which a stored reservation carries its audience, so encode and
 * decode must stay symmetric. Decoding never throws: anything unreadable
 * falls back to "All".
 */

import { ALL_AUDIENCES, type AudienceFilter, type AudienceTag } from '../types/index.js';

const CANONICAL_TAG = /^Sem \d+$/;
const ROMAN_NUMERALS = ['i', 'ii', 'iii', 'iv', 'v', 'vi', 'vii', 'viii', 'ix', 'x', 'xi', 'xii'];
const MAX_SEMESTER = ROMAN_NUMERALS.length;

export const DEFAULT_BRANCH = 'Unknown Branch';

export interface AudienceDescription {
  tag: AudienceTag;
  branch?: string;
}

const SEMESTER_THEN_NUMBER = /\bsem[a-z]*[\s\-_]*(\d{1,2})(?:st|nd|rd|th)?\b/i;
const NUMBER_THEN_SEMESTER = /\b(\d{1,2})(?:st|nd|rd|th)?[\s\-_]*sem/i;
const SEMESTER_THEN_ROMAN = /\bsem[a-z]*[\s\-_]+([ivx]+)\b/i;
const ROMAN_THEN_SEMESTER = /\b([ivx]+)(?:st|nd|rd|th)?[\s\-_]+sem/i;
const BARE_NUMBER = /\b(\d{1,2})(?:st|nd|rd|th)?\b/i;

function semesterTag(n: number): AudienceTag {
  return Number.isInteger(n) && n >= 1 && n <= MAX_SEMESTER ? `Sem ${n}` : ALL_AUDIENCES;
}

/**
 * Canonicalize free text such as "4th Semester", "Semester IV" or "sem-3"
 * to "Sem N". The number next to the semester word wins over any other
 * number in the header. Unrecognised or out-of-range input maps to "All".
 */
export function normalizeSemesterTag(raw: string | null | undefined): AudienceTag {
  const text = raw?.trim() ?? '';
  if (text === '' || text.toLowerCase() === ALL_AUDIENCES.toLowerCase()) {
    return ALL_AUDIENCES;
  }

  const numeric = SEMESTER_THEN_NUMBER.exec(text) ?? NUMBER_THEN_SEMESTER.exec(text);
  if (numeric?.[1]) {
    return semesterTag(Number(numeric[1]));
  }

  const roman = SEMESTER_THEN_ROMAN.exec(text) ?? ROMAN_THEN_SEMESTER.exec(text);
  if (roman?.[1]) {
    const index = ROMAN_NUMERALS.indexOf(roman[1].toLowerCase());
    return index >= 0 ? semesterTag(index + 1) : ALL_AUDIENCES;
  }

  // No semester word next to a number: "3" or "3rd" alone
  if (!/sem/i.test(text)) {
    const bare = BARE_NUMBER.exec(text);
    if (bare?.[1]) {
      return semesterTag(Number(bare[1]));
    }
  }

  return ALL_AUDIENCES;
}

/**
 * Encode the canonical description string
 */
export function encodeAudienceDescription(audience: AudienceDescription): string {
  return `Semester: ${audience.tag} | Branch: ${audience.branch ?? DEFAULT_BRANCH}`;
}

/**
 * Decode the canonical description string, tolerating legacy free text
 */
export function decodeAudienceDescription(description: string | null | undefined): AudienceDescription {
  const text = description ?? '';
  const marker = text.indexOf('Semester:');

  let tag: AudienceTag = ALL_AUDIENCES;
  if (marker >= 0) {
    const afterMarker = text.slice(marker + 'Semester:'.length);
    const rawTag = afterMarker.split('|')[0]?.trim() ?? '';
    tag = CANONICAL_TAG.test(rawTag) ? rawTag : normalizeSemesterTag(rawTag);
  }

  const branchMatch = /Branch:\s*([^|]*)/.exec(text);
  const branch = branchMatch?.[1]?.trim();

  return branch ? { tag, branch } : { tag };
}

/**
 * Normalize a caller-supplied filter: trimmed, de-duplicated, empty means "All"
 */
export function normalizeAudienceFilter(input: string | readonly string[] | undefined): AudienceFilter {
  if (input === undefined) return ALL_AUDIENCES;

  const tags = (typeof input === 'string' ? [input] : input)
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);

  if (tags.length === 0 || tags.includes(ALL_AUDIENCES)) {
    return ALL_AUDIENCES;
  }

  const unique = Array.from(new Set(tags));
  return unique.length === 1 && unique[0] !== undefined ? unique[0] : unique;
}

/**
 * Whether a recurring reservation tagged `reservationTag` matters to `filter`
 */
export function isAudienceRelevant(filter: AudienceFilter, reservationTag: AudienceTag): boolean {
  if (reservationTag === ALL_AUDIENCES) return true;

  const tags: readonly string[] = typeof filter === 'string' ? [filter] : filter;
  if (tags.length === 0 || tags.includes(ALL_AUDIENCES)) return true;

  return tags.includes(reservationTag);
}

/**
 * Display form of a filter, e.g. "Sem 3, Sem 5"
 */
export function describeAudience(filter: AudienceFilter): string {
  return typeof filter === 'string' ? filter : filter.join(', ');
}

/**
 * Single tag persisted on a transient booking made for `filter`
 */
export function tagForBooking(filter: AudienceFilter): AudienceTag {
  if (typeof filter === 'string') return filter;
  return filter.length === 1 && filter[0] !== undefined ? filter[0] : ALL_AUDIENCES;
}
