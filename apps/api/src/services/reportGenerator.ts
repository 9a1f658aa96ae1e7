import OpenAI from "openai";

import type { GeneratorConfig, ReportLocale } from "../config.js";
import { UpstreamGenerationError, describeUpstreamError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { escapeXml } from "./emotionCharts.js";
import { SUITABILITY_TOKEN } from "./reportDocument.js";
import { getReportStrings, type NarrativeFacts } from "./reportLocale.js";
import { NARRATIVE_PLACEHOLDERS } from "./reportPrompt.js";
import { EMOTION_KEYS, type EmotionKey, type ReportContext } from "./reportSchema.js";

export type GenerationRequest = {
  prompt: string;
  template: string;
  context: ReportContext;
  locale: ReportLocale;
};

export interface ReportTextGenerator {
  readonly provider: string;
  generate(request: GenerationRequest): Promise<string>;
}

/** The slice of the OpenAI SDK this module calls; tests substitute a fake. */
export type ResponsesClient = {
  responses: {
    create(body: { model: string; input: string; temperature: number }): Promise<{ output_text: string }>;
  };
};

export type OpenAIGeneratorOptions = {
  client: ResponsesClient;
  modelPrimary: string;
  modelFallback: string;
  temperature: number;
  logger?: Logger;
};

export function createReportGenerator(config: GeneratorConfig, logger: Logger = silentLogger): ReportTextGenerator {
  if (config.provider === "template") return templateReportGenerator;
  const client = new OpenAI({ apiKey: config.apiKey });
  return createOpenAIGenerator({
    client: { responses: { create: (body) => client.responses.create(body) } },
    modelPrimary: config.modelPrimary,
    modelFallback: config.modelFallback,
    temperature: config.temperature,
    logger
  });
}

export function createOpenAIGenerator(options: OpenAIGeneratorOptions): ReportTextGenerator {
  return { provider: "openai", generate: (request) => generateWithOpenAI(request, options) };
}

/**
 * Offline provider: fills the template from the numbers alone. Used without an API key and in
 * tests; the wording is fixed per locale.
 */
export const templateReportGenerator: ReportTextGenerator = {
  provider: "template",
  generate: (request) => Promise.resolve(generateWithTemplate(request))
};

async function generateWithOpenAI(request: GenerationRequest, options: OpenAIGeneratorOptions): Promise<string> {
  const { client, modelPrimary, modelFallback, temperature } = options;
  const logger = options.logger ?? silentLogger;
  const body = { input: request.prompt, temperature };

  let text: string;
  try {
    text = await (async () => {
      try {
        return (await client.responses.create({ model: modelPrimary, ...body })).output_text ?? "";
      } catch (err: unknown) {
        const details = describeUpstreamError(err);
        const shouldFallback =
          details.status === 400 ||
          details.status === 404 ||
          /model/i.test(details.message) ||
          /not found/i.test(details.message) ||
          /does not exist/i.test(details.message);
        if (!shouldFallback || modelFallback === modelPrimary) throw err;
        logger.warn({ model: modelPrimary, fallback: modelFallback, status: details.status }, "primary model rejected, retrying");
        return (await client.responses.create({ model: modelFallback, ...body })).output_text ?? "";
      }
    })();
  } catch (err: unknown) {
    const details = describeUpstreamError(err);
    throw new UpstreamGenerationError(`Report generation failed: ${details.message}`, details, err);
  }

  if (!text.trim()) throw new UpstreamGenerationError("Report generation returned no text");
  return text;
}

function generateWithTemplate(request: GenerationRequest): string {
  const { context } = request;
  const n = getReportStrings(request.locale).narrative;
  const facts = narrativeFacts(context, request.locale);
  const p = NARRATIVE_PLACEHOLDERS;

  // Replacer functions, so a "$" in a subject name is never read as a pattern.
  let html = request.template
    .replace(p.overview, () => n.overview(facts))
    .replace(p.emotionCommentary, () => n.emotion(facts))
    .replace(p.attentionCommentary, () => n.attention(facts))
    .replace(p.overallAssessment, () => n.assessment(facts))
    .replace(p.conclusions, () => n.conclusions[context.kind](facts));
  if (context.kind === 0) html = html.replace(SUITABILITY_TOKEN, () => n.suitability(facts));
  return html;
}

export function narrativeFacts(context: ReportContext, locale: ReportLocale): NarrativeFacts {
  const labels = getReportStrings(locale).emotionLabels;
  let dominant: EmotionKey = EMOTION_KEYS[0];
  for (const key of EMOTION_KEYS) {
    if (context.emotions[key] > context.emotions[dominant]) dominant = key;
  }

  return {
    subjectName: escapeXml(context.subjectName),
    sessionName: escapeXml(context.sessionName),
    dominantEmotion: labels[dominant],
    dominantValue: context.emotions[dominant].toFixed(1),
    score: String(context.score),
    averageScore: String(context.averageScore),
    scoreTrend: trend(context.score, context.averageScore),
    attentionTrend: trend(context.attention.offScreenSeconds, context.averageAttention.offScreenSeconds),
    offScreenSeconds: String(context.attention.offScreenSeconds),
    offScreenCount: String(context.attention.offScreenCount),
    averageOffScreenSeconds: String(context.averageAttention.offScreenSeconds)
  };
}

function trend(value: number, average: number): NarrativeFacts["scoreTrend"] {
  if (value > average) return "above";
  if (value < average) return "below";
  return "level";
}
