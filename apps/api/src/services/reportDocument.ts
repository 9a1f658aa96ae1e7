import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isText } from "domhandler";

import { UpstreamGenerationError } from "../errors.js";
import type { ReportKind } from "./reportSchema.js";

export const INSERTION_POINTS = {
  chart: "emotion-chart",
  logo: "header-logo",
  watermark: "watermark",
  suitability: "suitability-section",
  badge: "header-suitability"
} as const;

export type InsertionPointName = keyof typeof INSERTION_POINTS;

export const SUITABILITY_TOKEN = "{{suitability_section}}";
export const LOGO_TOKEN = "{{logo_src}}";

export type ImageAsset = { dataUri: string; alt: string };

export type AssembleInput = {
  generatedHtml: string;
  charts: { absolute: string; differential: string };
  logo: ImageAsset | null;
  kind: ReportKind;
};

export type AssembledReport = {
  html: string;
  applied: { charts: boolean; logo: boolean; watermark: boolean; suitabilityRemoved: boolean };
};

/**
 * Removes markdown fences and any chatter before the first tag. Generators are asked for bare HTML
 * but regularly wrap it anyway.
 */
export function stripCodeFences(text: string): string {
  let out = text.trim();
  const block = /```[a-zA-Z]*[ \t]*\r?\n([\s\S]*?)```/.exec(out);
  if (block) {
    out = block[1].trim();
  } else {
    out = out.replace(/^```[a-zA-Z]*/, "").replace(/```$/, "").trim();
  }
  const firstTag = out.indexOf("<");
  if (firstTag > 0) out = out.slice(firstTag);
  return out;
}

export function parseReportDocument(text: string): CheerioAPI {
  const cleaned = stripCodeFences(text);
  const fragment = cheerio.load(cleaned, null, false);
  if (fragment.root().children().length === 0) {
    throw new UpstreamGenerationError("Generated report is not HTML markup", {
      message: cleaned.slice(0, 200)
    });
  }
  return cheerio.load(cleaned);
}

export function findInsertionPoints($: CheerioAPI): Record<InsertionPointName, boolean> {
  const has = (id: string) => $(`#${id}`).length > 0;
  return {
    chart: has(INSERTION_POINTS.chart),
    logo: has(INSERTION_POINTS.logo),
    watermark: has(INSERTION_POINTS.watermark),
    suitability: has(INSERTION_POINTS.suitability),
    badge: has(INSERTION_POINTS.badge)
  };
}

export function assembleReportDocument(input: AssembleInput): AssembledReport {
  const $ = parseReportDocument(input.generatedHtml);
  const applied = { charts: false, logo: false, watermark: false, suitabilityRemoved: false };

  const chart = $(`#${INSERTION_POINTS.chart}`).first();
  if (chart.length) {
    chart.empty().append(input.charts.absolute + input.charts.differential);
    applied.charts = true;
  }

  const headerImg = $(`#${INSERTION_POINTS.logo} img`).first();
  const watermark = $(`#${INSERTION_POINTS.watermark}`).first();
  if (input.logo) {
    if (headerImg.length) {
      headerImg.attr("src", input.logo.dataUri);
      applied.logo = true;
    }
    if (watermark.length) {
      watermark.append($("<img>").attr("src", input.logo.dataUri).attr("alt", input.logo.alt));
      applied.watermark = true;
    }
  } else if (headerImg.length && (headerImg.attr("src") ?? "").includes(LOGO_TOKEN)) {
    // An unresolved template token would otherwise be fetched as a relative path.
    headerImg.remove();
  }

  if (input.kind === 1) {
    applied.suitabilityRemoved = removeSuitabilitySection($);
  }

  return { html: $.html(), applied };
}

function removeSuitabilitySection($: CheerioAPI): boolean {
  let removed = false;
  const section = $(`#${INSERTION_POINTS.suitability}`);
  if (section.length) {
    section.remove();
    removed = true;
  }

  // Generators sometimes drop the wrapper and leave the bare token behind.
  $("*")
    .contents()
    .each((_, node) => {
      if (!isText(node) || !node.data.includes(SUITABILITY_TOKEN)) return;
      const rest = node.data.split(SUITABILITY_TOKEN).join("");
      if (rest.trim()) {
        node.data = rest;
      } else {
        $(node).remove();
      }
      removed = true;
    });

  return removed;
}
