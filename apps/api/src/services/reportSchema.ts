import { z } from "zod";

// Canonical order; charts, prompts and CSV columns all iterate in this order.
export const EMOTION_KEYS = ["happy", "angry", "disgust", "fear", "sad", "surprised", "neutral"] as const;

export type EmotionKey = (typeof EMOTION_KEYS)[number];

export const EMOTION_COLORS: Readonly<Record<EmotionKey, string>> = {
  happy: "#d4eac8",
  angry: "#e5b9b5",
  disgust: "#d3cdd7",
  fear: "#a9b4c2",
  sad: "#b7d0e2",
  surprised: "#fdeac9",
  neutral: "#d8d8d8"
};

export const FALLBACK_BAR_COLOR = "#cccccc";

export type EmotionRecord = Readonly<Partial<Record<EmotionKey, number>>>;

export const ReportKindSchema = z.union([z.literal(0), z.literal(1)]);

/** 0 = interview candidate, 1 = customer conversation. */
export type ReportKind = z.infer<typeof ReportKindSchema>;

const Percentage = z.number().min(0).max(100);
const NonNegative = z.number().min(0);

const EmotionsSchema = z.object({
  happy: Percentage,
  angry: Percentage,
  disgust: Percentage,
  fear: Percentage,
  sad: Percentage,
  surprised: Percentage,
  neutral: Percentage
});

const AttentionSchema = z.object({
  offScreenSeconds: NonNegative,
  offScreenCount: z.number().int().min(0)
});

export const ReportContextSchema = z.object({
  subjectName: z.string().min(1),
  sessionName: z.string().min(1),
  kind: ReportKindSchema,
  score: Percentage,
  averageScore: Percentage,
  emotions: EmotionsSchema,
  averageEmotions: EmotionsSchema,
  attention: AttentionSchema,
  averageAttention: AttentionSchema,
  qa: z.object({ question: z.string(), answer: z.string() })
});

export type ReportContext = z.infer<typeof ReportContextSchema>;
