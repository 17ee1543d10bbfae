import { z } from 'zod';

/**
 * Paper domain entities
 */
export type VenueType = 'Journal' | 'Conference' | 'Preprint' | 'Unknown';

/**
 * One structured result extracted from a discovered item page.
 * Frozen once built; jobs share records between snapshots.
 */
export interface PaperRecord {
  title: string;
  authors: string[];
  year: number; // 0 when unknown
  publicationDate: string; // YYYY-MM-DD
  sourceUrl: string;
  artifactUrl: string | null;
  citationCount: number;
  venue: string | null;
  venueType: VenueType;
  summary: string | null;
}

export const PaperRecordSchema = z.object({
  title: z.string().trim().min(1, 'Title must not be empty'),
  authors: z.array(z.string().min(2)).max(10),
  year: z.number().int().min(0),
  publicationDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD'),
  sourceUrl: z.string().url(),
  artifactUrl: z.string().url().nullable(),
  citationCount: z.number().int().min(0),
  venue: z.string().min(1).nullable(),
  venueType: z.enum(['Journal', 'Conference', 'Preprint', 'Unknown']),
  summary: z.string().max(500).nullable(),
});

export interface WirePaperRecord {
  title: string;
  authors: string[];
  year: number;
  publication_date: string;
  source_url: string;
  artifact_url: string | null;
  citation_count: number;
  venue: string | null;
  venue_type: VenueType;
  summary: string | null;
}

export function toWirePaper(record: PaperRecord): WirePaperRecord {
  return {
    title: record.title,
    authors: [...record.authors],
    year: record.year,
    publication_date: record.publicationDate,
    source_url: record.sourceUrl,
    artifact_url: record.artifactUrl,
    citation_count: record.citationCount,
    venue: record.venue,
    venue_type: record.venueType,
    summary: record.summary,
  };
}
