import type { AnalyticRow, Review } from '../types/search';

/**
 * Flat, BI-friendly export rows. Column order is the order of the keys below
 * and is what the CSV header uses.
 */
export interface PlaceExportRow {
  place_id: string;
  name: string;
  address: string | null;
  lat: number;
  lon: number;
  distance_miles: number;
  review_count: number;
  mean_rating: number | null;
  positive_count: number;
  neutral_count: number;
  negative_count: number;
  high_negative_flag: boolean;
}

export interface ReviewExportRow {
  place_id: string;
  place_name: string;
  store_address: string | null;
  store_city: string | null;
  store_state: string | null;
  store_zip: string | null;
  author: string | null;
  rating: number;
  sentiment: string;
  issues: string;
  review_time_unix: number | null;
  date_utc: string | null;
  comment: string;
}

export const PLACE_EXPORT_COLUMNS: ReadonlyArray<keyof PlaceExportRow> = [
  'place_id',
  'name',
  'address',
  'lat',
  'lon',
  'distance_miles',
  'review_count',
  'mean_rating',
  'positive_count',
  'neutral_count',
  'negative_count',
  'high_negative_flag',
];

export const REVIEW_EXPORT_COLUMNS: ReadonlyArray<keyof ReviewExportRow> = [
  'place_id',
  'place_name',
  'store_address',
  'store_city',
  'store_state',
  'store_zip',
  'author',
  'rating',
  'sentiment',
  'issues',
  'review_time_unix',
  'date_utc',
  'comment',
];

export function toPlaceExportRow(row: AnalyticRow): PlaceExportRow {
  return {
    place_id: row.placeId,
    name: row.name,
    address: row.address,
    lat: row.lat,
    lon: row.lng,
    distance_miles: round(row.distanceMiles, 2),
    review_count: row.reviewCount,
    mean_rating: row.meanRating === null ? null : round(row.meanRating, 2),
    positive_count: row.sentimentCounts.positive,
    neutral_count: row.sentimentCounts.neutral,
    negative_count: row.sentimentCounts.negative,
    high_negative_flag: row.highNegative,
  };
}

export function toPlaceExportRows(rows: readonly AnalyticRow[]): PlaceExportRow[] {
  return rows.map(toPlaceExportRow);
}

export function toReviewExportRow(review: Review): ReviewExportRow {
  return {
    place_id: review.placeId,
    place_name: review.placeName,
    store_address: review.address,
    store_city: review.components?.city ?? null,
    store_state: review.components?.state ?? null,
    store_zip: review.components?.zip ?? null,
    author: review.author,
    rating: review.rating,
    sentiment: review.sentiment,
    issues: review.issues.join(';'),
    review_time_unix: review.unixTime,
    // "YYYY-MM-DD HH:MM:SS", UTC
    date_utc: review.publishedAt === null ? null : review.publishedAt.slice(0, 19).replace('T', ' '),
    comment: review.text,
  };
}

export function toReviewExportRows(reviews: readonly Review[]): ReviewExportRow[] {
  return reviews.map(toReviewExportRow);
}

/** RFC 4180 text: CRLF line ends, fields quoted only when they need it. */
export function toCsv<T extends object>(rows: readonly T[], columns: ReadonlyArray<keyof T>): string {
  const lines = [columns.map((c) => escapeCsvCell(String(c))).join(',')];
  for (const row of rows) {
    lines.push(columns.map((c) => escapeCsvCell(row[c])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

function escapeCsvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
