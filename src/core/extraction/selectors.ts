/**
 * Ordered selector candidates. Earlier entries win.
 */

export const SUBJECT_NAME_SELECTORS = ['#gsc_prf_in', '.gsc_prf_in', 'h1', '.gs_ai_name'];

export const SORT_CONTROL_SELECTORS = ['#gsc_a_ha', "button[aria-label*='Sort']", '.gsc_a_ha'];

export const SORT_BY_YEAR_SELECTORS = [
  "a[href*='sortby=pubdate']",
  "button[data-sort='year']",
  '.gsc_a_ha a',
];

export const SHOW_MORE_SELECTORS = ['#gsc_bpf_more', "button[onclick*='more']", '.gsc_bpf_more'];

export const ITEM_ROW_SELECTORS = ['.gsc_a_tr', 'tr.gsc_a_tr', '.gs_r.gs_or.gs_scl', '.gsc_a_t'];

export const ITEM_LINK_SELECTORS = ['a.gsc_a_at', 'a', '.gsc_a_at'];

// Field/value table of an item page
export const FIELD_ROW_SELECTOR = '.gs_scl';
export const FIELD_LABEL_SELECTOR = '.gsc_oci_field';
export const FIELD_VALUE_SELECTOR = '.gsc_oci_value';

export const TITLE_SELECTORS = ['#gsc_oci_title', '.gs_rt h3 a', '.gs_rt a', 'h1', '.citation_title', 'title'];

export const AUTHOR_LABELS = ['Authors', 'Inventors'];
export const AUTHOR_SELECTORS = ['.gs_a', '.citation_author', '.authors', '.author'];

export const DATE_LABELS = ['Publication date'];
export const DATE_SELECTORS = ['.gs_a', '.citation_date', '.year', '.date'];

export const ARTIFACT_SELECTORS = [
  '#gsc_oci_title_gg a',
  "a[href*='.pdf']",
  '.gs_or_ggsm a',
  '.citation_pdf_url',
  "a[href*='doi.org']",
  "a[href*='arxiv.org']",
];

export const CITATION_LABELS = ['Total citations'];
export const CITATION_SELECTORS = [".gs_fl a[href*='cites']", '.citation_count', "a[href*='cited']"];

export const VENUE_LABELS = ['Journal', 'Conference', 'Book', 'Source', 'Publisher'];
export const VENUE_SELECTORS = ['.gs_a', '.citation_venue', '.journal', '.conference'];

export const SUMMARY_LABELS = ['Description'];
export const SUMMARY_SELECTORS = ['#gsc_oci_descr', '.gs_rs', '.citation_abstract', '.abstract', '.description'];
