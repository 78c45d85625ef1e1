export const LANGUAGE_CODES = ["e", "s", "f", "r"] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

/** A listing record exactly as the document database returned it. */
export type ListingRecord = Record<string, unknown>;

/** One working paper, as described by the listing endpoint. */
export interface CanonicalRecord {
  paperId: string;
  meetingType: string;
  meetingNumber: string;
  abbreviation: string;
  number: number;
  /** 0 when the paper has no revision. */
  revision: number;
  /** File extension of the published documents, e.g. `pdf` or `doc`. */
  type: string;
  name?: string;
  meetingYear?: number;
  meetingId?: string;
  meetingName?: string;
  paperTypeId?: string;
  parties: string[];
}

export interface DocumentVariant {
  language: LanguageCode;
  filename: string;
  url: string;
}

/** Attributes recovered from the filename of a fetched document. */
export interface RawArtifact {
  filename: string;
  extension: string;
  meeting: string;
  abbreviation: string;
  /** Digits as written in the filename, leading zeros included. */
  paperNumber: string;
  revision: number;
  language: string;
}

export type UnresolvedReason = "no_match" | "ambiguous" | "unparseable_filename";

export interface ReconciledMetadata {
  paperId: string;
  paperName?: string;
  paperTypeId?: string;
  meetingType: string;
  meetingNumber: string;
  meetingId?: string;
  meetingName?: string;
  meetingYear?: number;
  parties: string;
}

export type ReconciledRecord =
  | (RawArtifact & ReconciledMetadata & { status: "matched"; candidates: 1; needsReview: false })
  | (Partial<RawArtifact> & {
      filename: string;
      status: "unresolved";
      reason: UnresolvedReason;
      candidates: number;
      needsReview: true;
    });

export interface MeasureApproval {
  country: string;
  date: string;
}

export interface MeasureRecord {
  measureNumber: number;
  rawTitle: string | null;
  rawText: string | null;
  characteristics: Record<string, string>;
  approvals: MeasureApproval[];
  sourceUrl: string;
  scrapedAt: string;
}

/** `in_flight`: another worker was fetching the same file; its own outcome is recorded there. */
export type VariantStatus = "written" | "skipped_existing" | "in_flight" | "not_found" | "timeout";

export interface VariantOutcome {
  language: LanguageCode;
  filename: string;
  url: string;
  status: VariantStatus;
  statusCode?: number;
  bytes?: number;
}

export interface RecordFetchResult {
  paperId: string;
  status: "ok" | "failed";
  variants: VariantOutcome[];
  error?: string;
  fetchedAt: string;
}

export interface MeasureCrawlResult {
  measureNumber: number;
  status: "scraped" | "missing" | "skipped_existing" | "failed";
  artifactPath?: string;
  error?: string;
  crawledAt: string;
}
