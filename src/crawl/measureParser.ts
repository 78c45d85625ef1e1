import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { MeasureApproval } from "../types";

export interface ParsedMeasurePage {
  rawTitle: string | null;
  rawText: string | null;
  characteristics: Record<string, string>;
  approvals: MeasureApproval[];
}

function normalizeLabel(value: string): string {
  return value.trim().toLowerCase().replace(/ /g, "_");
}

function extractTitle($: CheerioAPI): string | null {
  const heading = $("h1.title").first();
  return heading.length > 0 ? heading.text() : null;
}

// First text container only; <br> becomes a newline, every other tag is dropped.
function extractBodyText($: CheerioAPI): string | null {
  const container = $("div.text-container").first();
  if (container.length === 0) {
    return null;
  }
  container.find("br").replaceWith("\n");
  const text = container.text().trim();
  return text.length > 0 ? text : null;
}

function extractCharacteristics($: CheerioAPI): Record<string, string> {
  const characteristics: Record<string, string> = {};
  $("ul.characteristics__list")
    .first()
    .find("li.characteristics__item")
    .each((_, element) => {
      const item = $(element);
      const title = item.find("h2.characteristics__item__title").first();
      if (title.length === 0) {
        return;
      }
      const text = item.find("p.characteristics__item__text").first().text().trim();
      if (text) {
        characteristics[normalizeLabel(title.text())] = text;
      }
    });
  return characteristics;
}

function extractApprovals($: CheerioAPI): MeasureApproval[] {
  const approvals: MeasureApproval[] = [];
  $("table.approvals")
    .first()
    .find("tr")
    .each((_, element) => {
      const row = $(element);
      const country = row.find("th").first();
      const date = row.find("td").first();
      if (country.length === 0 || date.length === 0) {
        return;
      }
      approvals.push({ country: country.text().trim(), date: date.text().trim() });
    });
  return approvals;
}

/** Missing page sections yield null or empty values, never an error. */
export function parseMeasurePage(html: string): ParsedMeasurePage {
  const $ = load(html);
  return {
    rawTitle: extractTitle($),
    rawText: extractBodyText($),
    characteristics: extractCharacteristics($),
    approvals: extractApprovals($),
  };
}
