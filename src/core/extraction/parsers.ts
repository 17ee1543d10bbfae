import { VenueType } from '../entities/Paper.js';

/**
 * Pure parsers turning raw page text into record fields.
 * None of them throw; unusable input yields an empty result.
 */

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2030;
export const MAX_AUTHORS = 10;
export const SUMMARY_MIN_LENGTH = 20;
export const SUMMARY_MAX_LENGTH = 500;

export interface ParsedDate {
  year: number; // 0 when no year was found
  date: string; // YYYY-MM-DD or ''
}

export interface ParsedVenue {
  venue: string;
  venueType: VenueType;
}

// Separator must repeat: 2020/03/15 or 2020-03-15, not 2020/03-15
const YEAR_FIRST_DATE = /\b(\d{4})([/-])(\d{1,2})\2(\d{1,2})\b/g;
const MONTH_FIRST_DATE = /\b(\d{1,2})([/-])(\d{1,2})\2(\d{4})\b/g;
const BARE_YEAR = /\b(19\d{2}|20\d{2})\b/g;

function isYearInRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function formatDate(year: number, month: number, day: number): string | null {
  if (!isYearInRange(year) || month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Accepts YYYY/MM/DD, YYYY-MM-DD, MM/DD/YYYY and MM-DD-YYYY, then falls back to a
 * bare year between 1900 and 2030.
 */
export function parseDate(text: string): ParsedDate {
  for (const match of text.matchAll(YEAR_FIRST_DATE)) {
    const year = Number(match[1]);
    const date = formatDate(year, Number(match[3]), Number(match[4]));
    if (date) {
      return { year, date };
    }
  }

  for (const match of text.matchAll(MONTH_FIRST_DATE)) {
    const year = Number(match[4]);
    const date = formatDate(year, Number(match[1]), Number(match[3]));
    if (date) {
      return { year, date };
    }
  }

  for (const match of text.matchAll(BARE_YEAR)) {
    const year = Number(match[1]);
    if (isYearInRange(year)) {
      return { year, date: `${year}-01-01` };
    }
  }

  return { year: 0, date: '' };
}

/**
 * Byline text such as "J Smith, K Lee, … - Nature, 2020 - nature.com" to a clean,
 * deduplicated author list.
 */
export function parseAuthors(text: string, maxAuthors: number = MAX_AUTHORS): string[] {
  let head = text.split(' - ')[0];
  const yearRun = head.search(/\d{4}/);
  if (yearRun >= 0) {
    head = head.slice(0, yearRun);
  }

  const authors: string[] = [];
  for (const token of head.split(',')) {
    const cleaned = token
      .replace(/[^\p{L}\p{M}\p{N}_\s.-]/gu, '')
      .replace(/\d/g, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (cleaned.length <= 1 || !/\p{L}/u.test(cleaned) || authors.includes(cleaned)) {
      continue;
    }

    authors.push(cleaned);
    if (authors.length >= maxAuthors) {
      break;
    }
  }

  return authors;
}

const CITATION_PATTERNS: RegExp[] = [
  /cited by\s*(\d[\d,]*)/i,
  /引用\s*(\d[\d,]*)/,
  /(\d[\d,]*)\s+citations?/i,
  /(\d+)/,
];

/**
 * "Cited by 1,234" wins over any other number in the text
 */
export function parseCitations(text: string): number | null {
  for (const pattern of CITATION_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const value = parseInt(match[1].replace(/,/g, ''), 10);
      if (!Number.isNaN(value)) {
        return value;
      }
    }
  }
  return null;
}

const VENUE_KEYWORDS: Array<{ type: VenueType; keywords: string[] }> = [
  { type: 'Journal', keywords: ['journal', 'nature', 'science', 'ieee', 'acm', 'transactions', 'letters'] },
  { type: 'Conference', keywords: ['conference', 'proceedings', 'workshop', 'symposium'] },
  { type: 'Preprint', keywords: ['arxiv', 'preprint', 'biorxiv', 'medrxiv', 'ssrn'] },
];

export function inferVenueType(text: string): VenueType {
  const lower = text.toLowerCase();
  for (const { type, keywords } of VENUE_KEYWORDS) {
    if (keywords.some((keyword) => new RegExp(`\\b${keyword}\\b`).test(lower))) {
      return type;
    }
  }
  return 'Unknown';
}

/**
 * Venue name and type. For byline text the middle " - " segment is the venue.
 * A field label ("Conference", "Journal") takes part in the classification.
 */
export function parseVenue(text: string, label?: string): ParsedVenue | null {
  const segments = text.split(' - ');
  const candidate = (segments.length >= 2 ? segments[1] : text)
    .replace(/\([^)]*\)/g, '')
    .replace(/,?\s*\b(19|20)\d{2}\s*$/, '')
    .replace(/\s+/g, ' ')
    .replace(/[\s,;]+$/, '')
    .trim();

  if (!candidate) {
    return null;
  }

  return {
    venue: candidate,
    venueType: inferVenueType(label ? `${label} ${text}` : text),
  };
}

export function parseSummary(
  text: string,
  minLength: number = SUMMARY_MIN_LENGTH,
  maxLength: number = SUMMARY_MAX_LENGTH
): string | null {
  const summary = text.trim();
  if (summary.length <= minLength) {
    return null;
  }
  return summary.slice(0, maxLength);
}

export function isArtifactLink(href: string): boolean {
  const lower = href.toLowerCase().split(/[?#]/)[0];
  return lower.endsWith('.pdf') || href.includes('doi.org') || href.includes('arxiv.org');
}
