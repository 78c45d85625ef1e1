import { LANGUAGE_CODES } from "../types";
import type { CanonicalRecord, DocumentVariant, RawArtifact } from "../types";

export const DOCUMENT_BASE_URL = "https://documents.ats.aq";

// {meeting}_{abbreviation}{number}[_rev{n}]_{language}.{extension}
const ARTIFACT_FILENAME = /^([^_]+)_(\D+)(\d+)(?:_rev(\d+))?_([a-z]+)\.([A-Za-z0-9]+)$/;

function meetingCode(record: CanonicalRecord): string {
  return `${record.meetingType}${record.meetingNumber}`;
}

function paperToken(record: CanonicalRecord): string {
  return `${record.abbreviation}${String(record.number).padStart(3, "0")}`;
}

export function buildDocumentFilenames(record: CanonicalRecord): string[] {
  const revision = record.revision > 0 ? `rev${record.revision}` : undefined;
  return LANGUAGE_CODES.map((language) => {
    const segments = [meetingCode(record), paperToken(record), revision, language].filter(
      (segment): segment is string => Boolean(segment),
    );
    return `${segments.join("_")}.${record.type}`;
  });
}

/**
 * Derives the four per-language document URLs of a working paper, in the
 * order e, s, f, r. Variants are produced whether or not the server actually
 * publishes every language.
 */
export function resolveDocumentVariants(record: CanonicalRecord, baseUrl = DOCUMENT_BASE_URL): DocumentVariant[] {
  const base = `${baseUrl.replace(/\/+$/, "")}/${meetingCode(record)}/${record.abbreviation}`;
  const filenames = buildDocumentFilenames(record);
  return LANGUAGE_CODES.map((language, index) => ({
    language,
    filename: filenames[index],
    url: `${base}/${filenames[index]}`,
  }));
}

export function outputFilenameFromUrl(url: string): string {
  const segments = new URL(url).pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (!last) {
    throw new Error(`URL has no file segment: ${url}`);
  }
  return decodeURIComponent(last);
}

/** Inverse of {@link buildDocumentFilenames}; undefined for names outside the convention. */
export function parseArtifactFilename(filename: string): RawArtifact | undefined {
  const match = ARTIFACT_FILENAME.exec(filename);
  if (!match) {
    return undefined;
  }

  const [, meeting, abbreviation, paperNumber, revision, language, extension] = match;
  return {
    filename,
    extension,
    meeting,
    abbreviation,
    paperNumber,
    revision: revision ? Number.parseInt(revision, 10) : 0,
    language,
  };
}
