import { z } from "zod";
import type { CanonicalRecord, ListingRecord } from "../types";

const integer = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform((value) => Number.parseInt(value, 10)),
]);

const requiredText = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === "" ? undefined : String(value)));

const PartySchema = z.object({ Name: z.string().nullish() });

export const ListingPageSchema = z.object({
  payload: z.array(z.record(z.string(), z.unknown())),
  pager: z.object({
    next: integer.nullish(),
  }),
});

export type ListingPage = z.infer<typeof ListingPageSchema>;

export const CanonicalRecordSchema = z
  .object({
    Paper_id: requiredText,
    Meeting_type: z.string().min(1),
    Meeting_number: requiredText,
    Abbreviation: z.string().min(1),
    Number: integer,
    Revision: integer.nullish(),
    Type: z.string().min(1),
    Name: optionalText,
    Meeting_year: integer.nullish(),
    Meeting_id: optionalText,
    Meeting_name: optionalText,
    Pap_type_id: optionalText,
    Parties: z.array(PartySchema).nullish(),
  })
  .transform(
    (wire): CanonicalRecord => ({
      paperId: wire.Paper_id,
      meetingType: wire.Meeting_type,
      meetingNumber: wire.Meeting_number,
      abbreviation: wire.Abbreviation,
      number: wire.Number,
      revision: wire.Revision ?? 0,
      type: wire.Type,
      name: wire.Name,
      meetingYear: wire.Meeting_year ?? undefined,
      meetingId: wire.Meeting_id,
      meetingName: wire.Meeting_name,
      paperTypeId: wire.Pap_type_id,
      parties: (wire.Parties ?? []).map((party) => party.Name?.trim() ?? "").filter((name) => name.length > 0),
    }),
  );

export type ParsedListingRecord =
  | { ok: true; record: CanonicalRecord }
  | { ok: false; error: string };

export function parseListingRecord(raw: ListingRecord): ParsedListingRecord {
  const parsed = CanonicalRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    };
  }
  return { ok: true, record: parsed.data };
}
