import papaparsePkg from "papaparse";

import { InputFormatError, ValidationError } from "../errors.js";
import { EMOTION_KEYS, ReportContextSchema, type EmotionKey, type ReportContext } from "./reportSchema.js";

const { parse: parseCsv } = papaparsePkg;

type Column = { name: string; aliases: string[] };

// Column suffixes used by exports from the earlier Turkish-language tooling.
const LEGACY_EMOTION_NAMES: Record<EmotionKey, string> = {
  happy: "mutlu",
  angry: "kizgin",
  disgust: "igrenme",
  fear: "korku",
  sad: "uzgun",
  surprised: "saskin",
  neutral: "dogal"
};

const col = (name: string, ...aliases: string[]): Column => ({ name, aliases });

export const COLUMNS = {
  subjectName: col("subject_name", "kisi_adi"),
  sessionName: col("session_name", "mulakat_adi"),
  score: col("llm_score", "llm_skoru"),
  averageScore: col("avg_llm_score", "avg_llm_skoru"),
  offScreenSeconds: col("off_screen_seconds", "ekran_disi_sure_sn"),
  averageOffScreenSeconds: col("avg_off_screen_seconds", "avg_ekran_disi_sure_sn"),
  offScreenCount: col("off_screen_count", "ekran_disi_sayisi"),
  averageOffScreenCount: col("avg_off_screen_count", "avg_ekran_disi_sayisi"),
  question: col("question", "soru"),
  answer: col("answer", "cevap"),
  kind: col("kind", "tip")
} satisfies Record<string, Column>;

export function emotionColumn(key: EmotionKey): Column {
  return col(`emotion_${key}_pct`, `duygu_${LEGACY_EMOTION_NAMES[key]}_%`);
}

export function averageEmotionColumn(key: EmotionKey): Column {
  return col(`avg_emotion_${key}_pct`, `avg_duygu_${LEGACY_EMOTION_NAMES[key]}_%`);
}

export const REQUIRED_COLUMNS: Column[] = [
  ...Object.values(COLUMNS),
  ...EMOTION_KEYS.map(emotionColumn),
  ...EMOTION_KEYS.map(averageEmotionColumn)
];

export function parseSessionCsv(params: { buffer: Buffer; filename: string }): ReportContext {
  if (!params.filename.toLowerCase().endsWith(".csv")) {
    throw new InputFormatError("Wrong file format. Upload a .csv file.", { filename: params.filename });
  }
  if (params.buffer.includes(0)) {
    throw new InputFormatError("The uploaded file is not a text CSV.", { filename: params.filename });
  }

  const text = params.buffer.toString("utf8").replace(/^\uFEFF/, "");
  if (!text.trim()) throw new ValidationError("The uploaded CSV file is empty.");

  const parsed = parseCsv<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim()
  });

  const quoteErrors = parsed.errors.filter((e) => e.type === "Quotes");
  if (quoteErrors.length) {
    throw new InputFormatError("The CSV file could not be parsed.", {
      errors: quoteErrors.map((e) => ({ row: e.row, message: e.message }))
    });
  }

  const headers = parsed.meta.fields ?? [];
  const resolved = new Map<Column, string>();
  const missing: string[] = [];
  for (const column of REQUIRED_COLUMNS) {
    const header = [column.name, ...column.aliases].find((h) => headers.includes(h));
    if (header) resolved.set(column, header);
    else missing.push(column.name);
  }
  if (missing.length) {
    throw new ValidationError(`The CSV file is missing required columns: ${missing.join(", ")}`, {
      missingColumns: missing
    });
  }

  const row = parsed.data[0];
  if (!row) throw new ValidationError("The CSV file has no data rows.");

  const cell = (column: Column) => (row[resolved.get(column) ?? column.name] ?? "").trim();
  const decimal = (column: Column) => round2(toNumber(cell(column)));
  const integer = (column: Column) => Math.trunc(toNumber(cell(column)));

  const emotions = Object.fromEntries(EMOTION_KEYS.map((k) => [k, decimal(emotionColumn(k))]));
  const averageEmotions = Object.fromEntries(EMOTION_KEYS.map((k) => [k, decimal(averageEmotionColumn(k))]));

  const candidate = {
    subjectName: cell(COLUMNS.subjectName),
    sessionName: cell(COLUMNS.sessionName),
    // Counts are truncated; the kind flag must already be 0 or 1.
    kind: toNumber(cell(COLUMNS.kind)),
    score: decimal(COLUMNS.score),
    averageScore: decimal(COLUMNS.averageScore),
    emotions,
    averageEmotions,
    attention: {
      offScreenSeconds: decimal(COLUMNS.offScreenSeconds),
      offScreenCount: integer(COLUMNS.offScreenCount)
    },
    averageAttention: {
      offScreenSeconds: decimal(COLUMNS.averageOffScreenSeconds),
      offScreenCount: integer(COLUMNS.averageOffScreenCount)
    },
    qa: { question: cell(COLUMNS.question), answer: cell(COLUMNS.answer) }
  };

  const validated = ReportContextSchema.safeParse(candidate);
  if (!validated.success) {
    throw new ValidationError("The CSV row has invalid values.", { issues: describeIssues(validated.error.issues) });
  }
  return validated.data;
}

function toNumber(raw: string): number {
  if (!raw) return Number.NaN;
  return Number(raw);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}
