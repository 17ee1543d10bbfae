import { PaperRecord, PaperRecordSchema } from '../entities/Paper.js';
import { IPageSession } from '../interfaces/IPageSession.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import {
  ParsedDate,
  ParsedVenue,
  isArtifactLink,
  parseAuthors,
  parseCitations,
  parseDate,
  parseSummary,
  parseVenue,
} from './parsers.js';
import {
  ARTIFACT_SELECTORS,
  AUTHOR_LABELS,
  AUTHOR_SELECTORS,
  CITATION_LABELS,
  CITATION_SELECTORS,
  DATE_LABELS,
  DATE_SELECTORS,
  FIELD_LABEL_SELECTOR,
  FIELD_ROW_SELECTOR,
  FIELD_VALUE_SELECTOR,
  SUMMARY_LABELS,
  SUMMARY_SELECTORS,
  TITLE_SELECTORS,
  VENUE_LABELS,
  VENUE_SELECTORS,
} from './selectors.js';

/**
 * What every field candidate gets to look at
 */
export interface ExtractionContext {
  page: IPageSession;
  /** Item page field table, lower-cased label -> value */
  fields: Map<string, string>;
}

/**
 * One strategy for one field. `null` means "try the next candidate".
 */
export type FieldCandidate<T> = (context: ExtractionContext) => Promise<T | null>;

export async function firstPresent<T>(
  context: ExtractionContext,
  candidates: readonly FieldCandidate<T>[]
): Promise<T | null> {
  for (const candidate of candidates) {
    const value = await candidate(context);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

export function fromSelector<T>(selector: string, parse: (text: string) => T | null): FieldCandidate<T> {
  return async ({ page }) => {
    const element = await page.findFirst([selector]);
    return element ? parse(element.text) : null;
  };
}

export function fromLabel<T>(label: string, parse: (text: string, label: string) => T | null): FieldCandidate<T> {
  return async ({ fields }) => {
    const value = fields.get(label.toLowerCase());
    return value ? parse(value, label) : null;
  };
}

/**
 * Reads the label/value rows some item pages render their metadata in
 */
export async function readFieldTable(page: IPageSession): Promise<Map<string, string>> {
  const fields = new Map<string, string>();
  const rows = await page.findAll([FIELD_ROW_SELECTOR]);

  for (const row of rows) {
    const label = await page.findFirst([FIELD_LABEL_SELECTOR], row);
    const value = await page.findFirst([FIELD_VALUE_SELECTOR], row);
    const key = label?.text.toLowerCase();
    if (key && value?.text && !fields.has(key)) {
      fields.set(key, value.text);
    }
  }

  return fields;
}

function artifactFromSelector(selector: string): FieldCandidate<string> {
  return async ({ page }) => {
    for (const element of await page.findAll([selector])) {
      const href = await page.attribute(element, 'href');
      if (href && isArtifactLink(href)) {
        return href;
      }
    }
    return null;
  };
}

const acceptTitle = (text: string): string | null => (text.length > 5 ? text : null);

const acceptAuthors = (text: string): string[] | null => {
  const authors = parseAuthors(text);
  return authors.length > 0 ? authors : null;
};

const acceptDate = (text: string): ParsedDate | null => {
  const parsed = parseDate(text);
  return parsed.year > 0 ? parsed : null;
};

const TITLE_CANDIDATES = TITLE_SELECTORS.map((selector) => fromSelector(selector, acceptTitle));

const AUTHOR_CANDIDATES = [
  ...AUTHOR_LABELS.map((label) => fromLabel(label, acceptAuthors)),
  ...AUTHOR_SELECTORS.map((selector) => fromSelector(selector, acceptAuthors)),
];

const DATE_CANDIDATES = [
  ...DATE_LABELS.map((label) => fromLabel(label, acceptDate)),
  ...DATE_SELECTORS.map((selector) => fromSelector(selector, acceptDate)),
];

const ARTIFACT_CANDIDATES = ARTIFACT_SELECTORS.map(artifactFromSelector);

const CITATION_CANDIDATES = [
  ...CITATION_LABELS.map((label) => fromLabel(label, parseCitations)),
  ...CITATION_SELECTORS.map((selector) => fromSelector(selector, parseCitations)),
];

const VENUE_CANDIDATES: FieldCandidate<ParsedVenue>[] = [
  ...VENUE_LABELS.map((label) => fromLabel(label, parseVenue)),
  ...VENUE_SELECTORS.map((selector) => fromSelector(selector, (text) => parseVenue(text))),
];

const SUMMARY_CANDIDATES = [
  ...SUMMARY_LABELS.map((label) => fromLabel(label, (text) => parseSummary(text))),
  ...SUMMARY_SELECTORS.map((selector) => fromSelector(selector, (text) => parseSummary(text))),
];

/**
 * Turns the item page a session currently shows into a PaperRecord.
 * A page without a usable title yields null.
 */
export class PaperExtractor {
  constructor(private logger: Logger = silentLogger) {}

  async extract(page: IPageSession, itemUrl: string): Promise<PaperRecord | null> {
    const context: ExtractionContext = { page, fields: await readFieldTable(page) };

    const title = await firstPresent(context, TITLE_CANDIDATES);
    if (!title) {
      this.logger.debug(`No title found on ${itemUrl}`);
      return null;
    }

    const authors = (await firstPresent(context, AUTHOR_CANDIDATES)) ?? [];
    const date = (await firstPresent(context, DATE_CANDIDATES)) ?? { year: 0, date: '' };
    const artifactUrl = await firstPresent(context, ARTIFACT_CANDIDATES);
    const citationCount = (await firstPresent(context, CITATION_CANDIDATES)) ?? 0;
    const venue = await firstPresent(context, VENUE_CANDIDATES);
    const summary = await firstPresent(context, SUMMARY_CANDIDATES);

    const record: PaperRecord = {
      title,
      authors,
      year: date.year,
      publicationDate: date.date || (date.year > 0 ? `${date.year}-01-01` : '1900-01-01'),
      sourceUrl: itemUrl,
      artifactUrl,
      citationCount,
      venue: venue?.venue ?? null,
      venueType: venue?.venueType ?? 'Unknown',
      summary,
    };

    const validation = PaperRecordSchema.safeParse(record);
    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      this.logger.warn(`Discarding record for ${itemUrl}: ${issues.join(', ')}`);
      return null;
    }

    return Object.freeze(record);
  }
}
