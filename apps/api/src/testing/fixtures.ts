import type { AppConfig } from "../config.js";
import { EMOTION_KEYS, type ReportContext } from "../services/reportSchema.js";

export const sampleContext: ReportContext = {
  subjectName: "Jane Doe",
  sessionName: "Backend Interview",
  kind: 0,
  score: 85,
  averageScore: 70,
  emotions: { happy: 40, angry: 0, disgust: 0, fear: 5, sad: 5, surprised: 10, neutral: 40 },
  averageEmotions: { happy: 30, angry: 5, disgust: 0, fear: 5, sad: 10, surprised: 10, neutral: 40 },
  attention: { offScreenSeconds: 12, offScreenCount: 3 },
  averageAttention: { offScreenSeconds: 20, offScreenCount: 4 },
  qa: { question: "Why this role?", answer: "I enjoy distributed systems, mostly." }
};

export type CsvRow = Record<string, string | number>;

export function sessionRow(context: ReportContext = sampleContext): CsvRow {
  const row: CsvRow = {
    subject_name: context.subjectName,
    session_name: context.sessionName,
    llm_score: context.score,
    avg_llm_score: context.averageScore
  };
  for (const key of EMOTION_KEYS) row[`emotion_${key}_pct`] = context.emotions[key];
  for (const key of EMOTION_KEYS) row[`avg_emotion_${key}_pct`] = context.averageEmotions[key];
  return {
    ...row,
    off_screen_seconds: context.attention.offScreenSeconds,
    avg_off_screen_seconds: context.averageAttention.offScreenSeconds,
    off_screen_count: context.attention.offScreenCount,
    avg_off_screen_count: context.averageAttention.offScreenCount,
    question: context.qa.question,
    answer: context.qa.answer,
    kind: context.kind
  };
}

export function toCsv(row: CsvRow): string {
  const quote = (v: string | number) => {
    const s = String(v);
    return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
  };
  const headers = Object.keys(row);
  return `${headers.map(quote).join(",")}\n${headers.map((h) => quote(row[h])).join(",")}\n`;
}

export function sessionCsvBuffer(row: CsvRow = sessionRow()): Buffer {
  return Buffer.from(toCsv(row), "utf8");
}

export function testConfig(overrides: Partial<AppConfig["report"]> = {}): AppConfig {
  return {
    port: 0,
    webOrigin: "http://localhost:5173",
    logLevel: "silent",
    generator: { provider: "template", temperature: 0.7 },
    report: {
      locale: "en",
      assetsDir: "/nonexistent/assets",
      logoPath: "/nonexistent/assets/logo.png",
      company: { name: "Acme Test", email: "hello@example.com" },
      ...overrides
    }
  };
}

/** A 1x1 PNG. */
export const PIXEL_PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";
