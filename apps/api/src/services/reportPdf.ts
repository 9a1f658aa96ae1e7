import fs from "fs";
import path from "path";
import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { isTag, isText } from "domhandler";
import PDFDocument from "pdfkit";

import { RenderError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { INSERTION_POINTS } from "./reportDocument.js";

export type SvgShape =
  | { type: "rect"; x: number; y: number; width: number; height: number; fill: string; radius: number }
  | { type: "line"; x1: number; y1: number; x2: number; y2: number; stroke: string; strokeWidth: number }
  | {
      type: "text";
      x: number;
      y: number;
      text: string;
      fontSize: number;
      anchor: "start" | "middle" | "end";
      fill: string;
      bold: boolean;
    };

export type SvgChart = { width: number; height: number; opacity: number; shapes: SvgShape[] };

export type PdfBlock =
  | { type: "heading"; level: 1 | 2 | 3; text: string }
  | { type: "paragraph"; text: string; bold: boolean }
  | { type: "chart"; chart: SvgChart }
  | { type: "image"; src: string };

export type PdfLayout = {
  title: string;
  header: { logoSrc?: string; badge?: string };
  footerLines: Array<{ text: string; bold: boolean }>;
  watermarkSrc?: string;
  blocks: PdfBlock[];
};

export type RenderOptions = {
  /** Directory relative image paths and the default font directory resolve against. */
  baseDir?: string;
  fontDir?: string;
  logger?: Logger;
};

const SKIPPED_TAGS = new Set(["head", "style", "script", "meta", "title", "link"]);
const BLOCK_TAGS = new Set(["p", "h1", "h2", "h3", "h4", "div", "section", "svg", "img", "ul", "ol", "li", "table"]);
const RUNNING_IDS = new Set<string>([INSERTION_POINTS.logo, INSERTION_POINTS.badge, INSERTION_POINTS.watermark]);
const BOLD_CLASSES = ["qa-question", "fit"];
const WATERMARK_OPACITY = 0.05;
const FONT_FILES = { regular: "IBMPlexSans-Regular.ttf", bold: "IBMPlexSans-Bold.ttf" };
// Characters the standard PDF fonts encode beyond Latin-1 (WinAnsiEncoding).
const WIN_ANSI_EXTRAS = new Set("€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ");

export function extractPdfLayout(html: string): PdfLayout {
  const $ = cheerio.load(html);

  const logoSrc = usableSrc($(`#${INSERTION_POINTS.logo} img`).first().attr("src"));
  const badge = normalize($(`#${INSERTION_POINTS.badge}`).first().text()) || undefined;
  const watermarkSrc = usableSrc($(`#${INSERTION_POINTS.watermark} img`).first().attr("src"));

  const footerLines: PdfLayout["footerLines"] = [];
  $(".page-footer")
    .first()
    .children()
    .each((_, el) => {
      const child = $(el);
      const spans = child.children("span");
      const text = spans.length ? normalize(spans.map((__, s) => $(s).text()).get().join(" ")) : normalize(child.text());
      if (text) footerLines.push({ text, bold: child.hasClass("footer-company-name") });
    });

  const blocks: PdfBlock[] = [];
  $("body")
    .contents()
    .each((_, node) => collectBlocks($, node, blocks));

  return {
    title: normalize($("h1").first().text()) || normalize($("title").text()) || "Report",
    header: { logoSrc, badge },
    footerLines,
    watermarkSrc,
    blocks
  };
}

function collectBlocks($: CheerioAPI, node: AnyNode, out: PdfBlock[]): void {
  if (isText(node)) {
    const text = normalize(node.data);
    if (text) out.push({ type: "paragraph", text, bold: false });
    return;
  }
  if (!isTag(node)) return;

  const tag = node.tagName.toLowerCase();
  const el = $(node);
  if (SKIPPED_TAGS.has(tag) || RUNNING_IDS.has(el.attr("id") ?? "") || el.hasClass("page-footer")) return;

  if (tag === "h1" || tag === "h2" || tag === "h3") {
    const text = normalize(el.text());
    if (text) out.push({ type: "heading", level: tag === "h1" ? 1 : tag === "h2" ? 2 : 3, text });
    return;
  }
  if (tag === "svg") {
    out.push({ type: "chart", chart: parseSvgChart($, el) });
    return;
  }
  if (tag === "img") {
    const src = usableSrc(el.attr("src"));
    if (src) out.push({ type: "image", src });
    return;
  }
  if (tag === "li") {
    const text = normalize(el.text());
    if (text) out.push({ type: "paragraph", text: `• ${text}`, bold: false });
    return;
  }

  const hasBlockChildren = el.children().toArray().some((child) => BLOCK_TAGS.has(child.tagName.toLowerCase()));
  if (tag === "p" || !hasBlockChildren) {
    const text = normalize(el.text());
    if (text) out.push({ type: "paragraph", text, bold: BOLD_CLASSES.some((c) => el.hasClass(c)) });
    return;
  }

  el.contents().each((_, child) => collectBlocks($, child, out));
}

export function parseSvgChart($: CheerioAPI, svg: Cheerio<Element>): SvgChart {
  const viewBox = (svg.attr("viewBox") ?? "").split(/[\s,]+/).map(Number);
  const width = num(svg.attr("width")) || viewBox[2] || 0;
  const height = num(svg.attr("height")) || viewBox[3] || 0;

  const styled = svg.closest("[style*=opacity]");
  const opacityMatch = /opacity\s*:\s*([\d.]+)/.exec(styled.attr("style") ?? "");
  const opacity = opacityMatch ? Math.min(1, Math.max(0, Number(opacityMatch[1]))) : 1;

  const shapes: SvgShape[] = [];
  svg.children().each((_, node) => {
    const el = $(node);
    switch (node.tagName.toLowerCase()) {
      case "rect":
        shapes.push({
          type: "rect",
          x: num(el.attr("x")),
          y: num(el.attr("y")),
          width: num(el.attr("width")),
          height: num(el.attr("height")),
          fill: el.attr("fill") ?? "#cccccc",
          radius: num(el.attr("rx"))
        });
        break;
      case "line":
        shapes.push({
          type: "line",
          x1: num(el.attr("x1")),
          y1: num(el.attr("y1")),
          x2: num(el.attr("x2")),
          y2: num(el.attr("y2")),
          stroke: el.attr("stroke") ?? "#cccccc",
          strokeWidth: num(el.attr("stroke-width")) || 1
        });
        break;
      case "text": {
        const anchor = el.attr("text-anchor");
        shapes.push({
          type: "text",
          x: num(el.attr("x")),
          y: num(el.attr("y")),
          text: normalize(el.text()),
          fontSize: num(el.attr("font-size")) || 10,
          anchor: anchor === "middle" || anchor === "end" ? anchor : "start",
          fill: el.attr("fill") ?? "#333333",
          bold: el.attr("font-weight") === "bold"
        });
        break;
      }
      default:
        break;
    }
  });

  return { width, height, opacity, shapes };
}

export async function renderReportPdf(html: string, options: RenderOptions = {}): Promise<Buffer> {
  const logger = options.logger ?? silentLogger;
  const baseDir = options.baseDir ?? process.cwd();

  let layout: PdfLayout;
  try {
    layout = extractPdfLayout(html);
  } catch (err: unknown) {
    throw new RenderError("Report markup could not be laid out", { cause: err });
  }

  const fontDir = options.fontDir ?? path.join(baseDir, "fonts");
  const fonts = resolveFonts(fontDir);
  if (!fonts.files) {
    const characters = unencodableCharacters(layoutText(layout));
    if (characters.length) {
      throw new RenderError(
        `Report text needs ${FONT_FILES.regular} and ${FONT_FILES.bold} in ${fontDir}; the standard fonts cannot encode: ${characters.join("")}`,
        { details: { fontDir, characters } }
      );
    }
    logger.debug({ fontDir }, "report fonts not found, using Helvetica");
  }

  const images = await loadImages(layout, baseDir, logger);

  try {
    return await drawLayout(layout, images, fonts);
  } catch (err: unknown) {
    if (err instanceof RenderError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new RenderError(`PDF rendering failed: ${message}`, { cause: err });
  }
}

type Fonts = { regular: string; bold: string; files?: { regular: string; bold: string } };

function resolveFonts(fontDir: string): Fonts {
  const regular = path.join(fontDir, FONT_FILES.regular);
  const bold = path.join(fontDir, FONT_FILES.bold);
  if (fs.existsSync(regular) && fs.existsSync(bold)) {
    return { regular: "Body", bold: "Body-Bold", files: { regular, bold } };
  }
  return { regular: "Helvetica", bold: "Helvetica-Bold" };
}

function layoutText(layout: PdfLayout): string[] {
  const texts = [layout.title, layout.header.badge ?? "", ...layout.footerLines.map((l) => l.text)];
  for (const block of layout.blocks) {
    if (block.type === "heading" || block.type === "paragraph") texts.push(block.text);
    else if (block.type === "chart") {
      for (const shape of block.chart.shapes) if (shape.type === "text") texts.push(shape.text);
    }
  }
  return texts;
}

export function unencodableCharacters(texts: string[]): string[] {
  const found = new Set<string>();
  for (const text of texts) {
    for (const ch of text) {
      const code = ch.codePointAt(0) ?? 0;
      if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(ch)) continue;
      found.add(ch);
    }
  }
  return [...found];
}

async function loadImages(layout: PdfLayout, baseDir: string, logger: Logger): Promise<Map<string, Buffer>> {
  const sources = new Set<string>();
  if (layout.header.logoSrc) sources.add(layout.header.logoSrc);
  if (layout.watermarkSrc) sources.add(layout.watermarkSrc);
  for (const block of layout.blocks) if (block.type === "image") sources.add(block.src);

  const images = new Map<string, Buffer>();
  for (const src of sources) {
    if (/^https?:/i.test(src)) {
      logger.warn({ src }, "remote image skipped");
      continue;
    }
    const dataUri = /^data:image\/(png|jpe?g);base64,(.*)$/is.exec(src);
    if (dataUri) {
      images.set(src, Buffer.from(dataUri[2], "base64"));
      continue;
    }
    if (src.startsWith("data:")) {
      logger.warn({ mime: src.slice(5, src.indexOf(";")) }, "unsupported inline image skipped");
      continue;
    }
    const file = path.resolve(baseDir, src);
    try {
      images.set(src, await fs.promises.readFile(file));
    } catch (err: unknown) {
      throw new RenderError(`Missing local asset referenced by the report: ${src}`, { cause: err, details: { file } });
    }
  }
  return images;
}

async function drawLayout(layout: PdfLayout, images: Map<string, Buffer>, fonts: Fonts): Promise<Buffer> {
  const doc = new PDFDocument({
    size: "A4",
    margins: { top: 70, bottom: 70, left: 48, right: 48 },
    bufferPages: true,
    info: { Title: layout.title }
  });
  const chunks: Buffer[] = [];
  doc.on("data", (c: Buffer) => chunks.push(c));
  const done = new Promise<void>((resolve, reject) => {
    doc.on("end", () => resolve());
    doc.on("error", reject);
  });

  if (fonts.files) {
    doc.registerFont(fonts.regular, fonts.files.regular);
    doc.registerFont(fonts.bold, fonts.files.bold);
  }

  const contentWidth = doc.page.width - doc.page.margins.left - doc.page.margins.right;

  for (const block of layout.blocks) {
    switch (block.type) {
      case "heading": {
        const size = block.level === 1 ? 18 : block.level === 2 ? 14 : 12;
        const color = block.level === 1 ? "#2c3e50" : block.level === 2 ? "#34495e" : "#7f8c8d";
        if (block.level > 1) doc.moveDown(0.6);
        doc
          .font(fonts.bold)
          .fontSize(size)
          .fillColor(color)
          .text(block.text, { align: block.level === 1 ? "center" : "left" });
        doc.moveDown(block.level === 1 ? 0.8 : 0.4);
        break;
      }
      case "paragraph":
        doc
          .font(block.bold ? fonts.bold : fonts.regular)
          .fontSize(10)
          .fillColor("#333333")
          .text(block.text, { align: "left", lineGap: 2 });
        doc.moveDown(0.5);
        break;
      case "chart":
        drawChart(doc, block.chart, fonts, contentWidth);
        break;
      case "image": {
        const image = images.get(block.src);
        if (!image) break;
        doc.image(image, { fit: [contentWidth, 200], align: "center" });
        doc.moveDown(0.5);
        break;
      }
    }
  }

  const range = doc.bufferedPageRange();
  for (let i = range.start; i < range.start + range.count; i++) {
    doc.switchToPage(i);
    drawPageChrome(doc, layout, images, fonts);
  }

  doc.end();
  await done;
  return Buffer.concat(chunks);
}

function drawChart(doc: PDFKit.PDFDocument, chart: SvgChart, fonts: Fonts, contentWidth: number): void {
  if (chart.width <= 0 || chart.height <= 0) return;
  const scale = Math.min(1, contentWidth / chart.width);
  const height = chart.height * scale;
  const bottom = doc.page.height - doc.page.margins.bottom;
  if (doc.y + height > bottom) doc.addPage();

  const ox = doc.page.margins.left + (contentWidth - chart.width * scale) / 2;
  const oy = doc.y;

  doc.save();
  doc.opacity(chart.opacity);
  doc.roundedRect(ox, oy, chart.width * scale, height, 8 * scale).fillAndStroke("#fcfcfc", "#eeeeee");

  for (const shape of chart.shapes) {
    if (shape.type === "rect") {
      if (shape.width <= 0 || shape.height <= 0) continue;
      doc
        .roundedRect(ox + shape.x * scale, oy + shape.y * scale, shape.width * scale, shape.height * scale, shape.radius * scale)
        .fill(shape.fill);
    } else if (shape.type === "line") {
      doc
        .moveTo(ox + shape.x1 * scale, oy + shape.y1 * scale)
        .lineTo(ox + shape.x2 * scale, oy + shape.y2 * scale)
        .lineWidth(shape.strokeWidth * scale)
        .stroke(shape.stroke);
    } else {
      const size = shape.fontSize * scale;
      doc.font(shape.bold ? fonts.bold : fonts.regular).fontSize(size);
      const width = doc.widthOfString(shape.text);
      const x = ox + shape.x * scale - (shape.anchor === "middle" ? width / 2 : shape.anchor === "end" ? width : 0);
      // SVG text is positioned by its baseline, pdfkit text by the top of the line box.
      const y = oy + shape.y * scale - size * 0.8;
      doc.fillColor(shape.fill).text(shape.text, x, y, { lineBreak: false });
    }
  }
  doc.restore();

  doc.x = doc.page.margins.left;
  doc.y = oy + height + 12;
}

function drawPageChrome(doc: PDFKit.PDFDocument, layout: PdfLayout, images: Map<string, Buffer>, fonts: Fonts): void {
  const { width, height, margins } = doc.page;

  const watermark = layout.watermarkSrc ? images.get(layout.watermarkSrc) : undefined;
  if (watermark) {
    const size = Math.min(width * 0.7, 420);
    doc.save();
    doc.opacity(WATERMARK_OPACITY);
    doc.image(watermark, (width - size) / 2, (height - size) / 2, { fit: [size, size], align: "center", valign: "center" });
    doc.restore();
  }

  const logo = layout.header.logoSrc ? images.get(layout.header.logoSrc) : undefined;
  if (logo) doc.image(logo, margins.left, 20, { width: 40 });

  if (layout.header.badge) {
    doc.font(fonts.bold).fontSize(11);
    const textWidth = doc.widthOfString(layout.header.badge);
    const x = width - margins.right - textWidth - 12;
    doc.save();
    doc.roundedRect(x - 8, 18, textWidth + 16, 22, 6).lineWidth(1.5).stroke("#27ae60");
    doc.restore();
    doc.fillColor("#2c3e50").text(layout.header.badge, x, 24, { lineBreak: false });
  }

  let y = height - 55;
  doc.save();
  doc
    .moveTo(width * 0.05, y)
    .lineTo(width * 0.95, y)
    .lineWidth(0.5)
    .stroke("#cccccc");
  doc.restore();
  y += 5;
  for (const line of layout.footerLines) {
    const size = line.bold ? 8 : 7;
    doc.font(line.bold ? fonts.bold : fonts.regular).fontSize(size);
    const textWidth = doc.widthOfString(line.text);
    doc.fillColor("#555555").text(line.text, (width - textWidth) / 2, y, { lineBreak: false });
    y += size + 4;
  }
}

function usableSrc(src: string | undefined): string | undefined {
  if (!src || !src.trim() || src.includes("{{")) return undefined;
  return src.trim();
}

function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function num(value: string | undefined): number {
  const n = Number.parseFloat(value ?? "");
  return Number.isFinite(n) ? n : 0;
}
