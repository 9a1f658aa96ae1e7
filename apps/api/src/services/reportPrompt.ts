import type { CompanyIdentity, ReportLocale } from "../config.js";
import { escapeXml } from "./emotionCharts.js";
import { INSERTION_POINTS, LOGO_TOKEN, SUITABILITY_TOKEN } from "./reportDocument.js";
import { getReportStrings, type ReportStrings } from "./reportLocale.js";
import { EMOTION_KEYS, type ReportContext } from "./reportSchema.js";

/** Narrative slots the generator fills in; the suitability slot is handled separately. */
export const NARRATIVE_PLACEHOLDERS = {
  overview: "{{overview}}",
  emotionCommentary: "{{emotion_commentary}}",
  attentionCommentary: "{{attention_commentary}}",
  overallAssessment: "{{overall_assessment}}",
  conclusions: "{{conclusions}}"
} as const;

export type ReportPrompt = { prompt: string; template: string };

export function formatQaSection(qa: ReportContext["qa"], strings: ReportStrings): string {
  return [
    '<div class="qa-item">',
    `  <p class="qa-question">${escapeXml(strings.questionLabel)}: ${escapeXml(qa.question)}</p>`,
    `  <p class="qa-answer">${escapeXml(strings.answerLabel)}: ${escapeXml(qa.answer)}</p>`,
    "</div>"
  ].join("\n");
}

export function buildReportTemplate(
  context: ReportContext,
  options: { locale: ReportLocale; company: CompanyIdentity }
): string {
  const s = getReportStrings(options.locale);
  const p = NARRATIVE_PLACEHOLDERS;
  const contact = [options.company.email, options.company.address, options.company.phone]
    .filter((v): v is string => Boolean(v))
    .map((v) => `<span>${escapeXml(v)}</span>`)
    .join("<span>-</span>");

  return `<!DOCTYPE html>
<html lang="${options.locale}">
<head>
<meta charset="UTF-8">
<style>
${TEMPLATE_CSS}
</style>
</head>
<body>
<div class="page-header-logo" id="${INSERTION_POINTS.logo}"><img src="${LOGO_TOKEN}" alt="Logo"></div>
<div class="page-header-suitability" id="${INSERTION_POINTS.badge}">${escapeXml(s.badgeLabel)} <span class="percentage">${escapeXml(s.percent(String(context.score)))}</span></div>
<div class="page-footer">
<div class="footer-divider"></div>
<div class="footer-company-name">${escapeXml(options.company.name)}</div>
<div class="footer-contact-info">${contact}</div>
</div>
<div class="watermark-image-container" id="${INSERTION_POINTS.watermark}"></div>
<h1>${escapeXml(context.subjectName)} - ${escapeXml(s.reportTitle[context.kind])}</h1>
<div class="section">
<h2>${escapeXml(s.headings.overview)}</h2>
<p>${p.overview}</p>
</div>
<div class="section">
<h2>${escapeXml(s.headings.analysis)}</h2>
<h3>${escapeXml(s.headings.emotionAnalysis)}</h3>
<div id="${INSERTION_POINTS.chart}"></div>
<p>${p.emotionCommentary}</p>
<h3>${escapeXml(s.headings.attentionAnalysis)}</h3>
<p>${p.attentionCommentary}</p>
</div>
<div class="section">
<h2>${escapeXml(s.headings.overallAssessment)}</h2>
<p>${p.overallAssessment}</p>
</div>
<div class="section">
<h2>${escapeXml(s.headings.questionsAndAnswers)}</h2>
${formatQaSection(context.qa, s)}
</div>
<div class="section">
<h2>${escapeXml(s.headings.conclusions)}</h2>
<p>${p.conclusions}</p>
</div>
<div id="${INSERTION_POINTS.suitability}">${SUITABILITY_TOKEN}</div>
</body>
</html>`;
}

export function buildReportPrompt(
  context: ReportContext,
  options: { locale: ReportLocale; company: CompanyIdentity }
): ReportPrompt {
  const s = getReportStrings(options.locale);
  const ps = s.prompt;
  const kind = context.kind;
  const template = buildReportTemplate(context, options);

  const emotions = EMOTION_KEYS.map((k) => `${s.emotionLabels[k]} ${context.emotions[k]}`).join(", ");
  const averages = EMOTION_KEYS.map((k) => `${s.emotionLabels[k]} ${context.averageEmotions[k]}`).join(", ");

  const dataLines = [
    `- ${ps.subjectLabel[kind]}: ${context.subjectName}`,
    `- ${ps.sessionLabel[kind]}: ${context.sessionName}`,
    // Customer prompts carry no score line.
    kind === 0 ? `- ${ps.scoreLine(String(context.score), String(context.averageScore))}` : "",
    `- ${ps.emotionLine}: ${emotions}`,
    `- ${ps.emotionLine} (avg): ${averages}`,
    `- ${ps.attentionLine(
      String(context.attention.offScreenSeconds),
      String(context.attention.offScreenCount),
      String(context.averageAttention.offScreenSeconds),
      String(context.averageAttention.offScreenCount)
    )}`
  ].filter(Boolean);

  const p = NARRATIVE_PLACEHOLDERS;
  const fieldLines = [
    `1. \`${p.overview}\`: ${ps.overview[kind]}`,
    `2. \`${p.emotionCommentary}\`: ${ps.emotionCommentary[kind]}`,
    `3. \`${p.attentionCommentary}\`: ${ps.attentionCommentary[kind]}`,
    `4. \`${p.overallAssessment}\`: ${ps.overallAssessment[kind]}`,
    `5. \`${p.conclusions}\`: ${ps.conclusions[kind]}`,
    `6. \`${SUITABILITY_TOKEN}\`: ${ps.suitability[kind](String(context.score))}`
  ];

  const prompt = [
    ps.intro,
    "",
    ...dataLines,
    "",
    ps.fieldsHeading,
    ...fieldLines,
    "",
    ps.rulesHeading,
    ...ps.rules.map((r) => `- ${r}`),
    "",
    ps.templateHeading,
    template
  ].join("\n");

  return { prompt, template };
}

const TEMPLATE_CSS = `@font-face { font-family: "IBMPlexSans"; src: url("fonts/IBMPlexSans-Regular.ttf"); font-weight: normal; }
@font-face { font-family: "IBMPlexSans"; src: url("fonts/IBMPlexSans-Bold.ttf"); font-weight: bold; }
body { font-family: "IBMPlexSans", sans-serif; line-height: 1.7; margin: 25px; color: #333; font-size: 10pt; }
h1 { color: #2c3e50; text-align: center; border-bottom: 2px solid #3498db; padding-bottom: 10px; font-size: 24px; }
h2 { color: #34495e; margin-top: 35px; border-bottom: 1px solid #bdc3c7; padding-bottom: 8px; font-size: 20px; }
h3 { color: #7f8c8d; font-size: 16px; margin-bottom: 15px; }
.section { margin-bottom: 30px; }
.qa-item { margin-bottom: 15px; padding: 12px; border: 1px solid #e0e0e0; border-radius: 8px; }
.qa-question { font-weight: bold; color: #34495e; }
.qa-answer { color: #555; margin-top: 5px; }
.watermark-image-container { position: fixed; top: 50%; left: 50%; transform: translate(-50%, -50%); z-index: -1; opacity: 0.05; width: 70%; max-width: 600px; }
.watermark-image-container img { width: 100%; height: auto; }
@page {
  margin: 70px 12.5px;
  @top-left { content: element(header_logo); }
  @top-right { content: element(header_suitability); }
  @bottom-center { content: element(footer_content); }
}
.page-header-logo { position: running(header_logo); }
.page-header-logo img { width: 40px; height: auto; }
.page-header-suitability { position: running(header_suitability); text-align: right; font-size: 12px; font-weight: bold; border: 2px solid #27ae60; border-radius: 8px; padding: 8px 12px; }
.page-header-suitability .percentage { font-size: 16px; color: #27ae60; }
.page-footer { position: running(footer_content); text-align: center; font-size: 8px; color: #555; }
.footer-divider { border-top: 0.5px solid #ccc; margin: 0 auto 5px auto; width: 90%; }
.footer-company-name { font-weight: bold; }
.footer-contact-info { font-size: 7px; display: flex; justify-content: center; gap: 10px; }`;
