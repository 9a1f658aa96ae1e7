import type { ReportLocale } from "../config.js";
import type { EmotionKey, ReportKind } from "./reportSchema.js";

export type NarrativeFacts = {
  subjectName: string;
  sessionName: string;
  dominantEmotion: string;
  dominantValue: string;
  score: string;
  averageScore: string;
  scoreTrend: "above" | "below" | "level";
  attentionTrend: "above" | "below" | "level";
  offScreenSeconds: string;
  offScreenCount: string;
  averageOffScreenSeconds: string;
};

export type ReportStrings = {
  reportTitle: Record<ReportKind, string>;
  headings: {
    overview: string;
    analysis: string;
    emotionAnalysis: string;
    attentionAnalysis: string;
    overallAssessment: string;
    questionsAndAnswers: string;
    conclusions: string;
    suitability: string;
  };
  badgeLabel: string;
  percent: (value: string) => string;
  questionLabel: string;
  answerLabel: string;
  emotionLabels: Record<EmotionKey, string>;
  chartTitles: { absolute: string; differential: string };
  noChartData: string;
  prompt: {
    intro: string;
    subjectLabel: Record<ReportKind, string>;
    sessionLabel: Record<ReportKind, string>;
    scoreLine: (score: string, average: string) => string;
    emotionLine: string;
    attentionLine: (seconds: string, count: string, avgSeconds: string, avgCount: string) => string;
    fieldsHeading: string;
    overview: Record<ReportKind, string>;
    emotionCommentary: Record<ReportKind, string>;
    attentionCommentary: Record<ReportKind, string>;
    overallAssessment: Record<ReportKind, string>;
    conclusions: Record<ReportKind, string>;
    suitability: Record<ReportKind, (score: string) => string>;
    rulesHeading: string;
    rules: string[];
    templateHeading: string;
  };
  narrative: {
    overview: (f: NarrativeFacts) => string;
    emotion: (f: NarrativeFacts) => string;
    attention: (f: NarrativeFacts) => string;
    assessment: (f: NarrativeFacts) => string;
    conclusions: Record<ReportKind, (f: NarrativeFacts) => string>;
    suitability: (f: NarrativeFacts) => string;
  };
};

const enHeadings: ReportStrings["headings"] = {
  overview: "1) Overview",
  analysis: "2) Analysis",
  emotionAnalysis: "Emotion Analysis",
  attentionAnalysis: "Attention Analysis",
  overallAssessment: "3) Overall Assessment",
  questionsAndAnswers: "4) Questions and Answers",
  conclusions: "5) Conclusions and Recommendations",
  suitability: "6) Position Fit Assessment"
};

const en: ReportStrings = {
  reportTitle: { 0: "Interview Evaluation Report", 1: "Conversation Evaluation Report" },
  headings: enHeadings,
  badgeLabel: "Position Fit:",
  percent: (value) => `${value}%`,
  questionLabel: "Question",
  answerLabel: "Answer",
  emotionLabels: {
    happy: "Happy",
    angry: "Angry",
    disgust: "Disgust",
    fear: "Fear",
    sad: "Sad",
    surprised: "Surprised",
    neutral: "Neutral"
  },
  chartTitles: { absolute: "Emotion Analysis", differential: "Emotion Difference from Average" },
  noChartData: "No emotion data to display.",
  prompt: {
    intro: "Fill in the HTML template below with the session data and return one complete HTML report.",
    subjectLabel: { 0: "Candidate name", 1: "Customer name" },
    sessionLabel: { 0: "Interview name", 1: "Conversation name" },
    scoreLine: (score, average) => `LLM score: ${score}, average LLM score: ${average}`,
    emotionLine: "Emotion analysis (%)",
    attentionLine: (seconds, count, avgSeconds, avgCount) =>
      `Attention analysis: off-screen time ${seconds} s, off-screen glances ${count}, ` +
      `average off-screen time ${avgSeconds} s, average off-screen glances ${avgCount}`,
    fieldsHeading: "Instructions for each placeholder:",
    overview: {
      0: "Write a detailed introduction of at least two paragraphs summarising the candidate's performance, communication skills and the flow of the interview.",
      1: "Write a detailed introduction of at least two paragraphs summarising the customer's communication and the flow of the conversation."
    },
    emotionCommentary: {
      0: 'Interpret the emotion percentages above: which emotions dominate and what that may mean in an interview. At least two paragraphs. The first sentence must be exactly: "The candidate\'s emotions were analysed from video and audio."',
      1: 'Interpret the emotion percentages above: which emotions dominate and what that may mean in the conversation. At least two paragraphs. The first sentence must be exactly: "The person\'s emotions were analysed from video and audio."'
    },
    attentionCommentary: {
      0: "Interpret the off-screen time and glance counts against the averages and explain what they suggest about the candidate's focus. At least one paragraph.",
      1: "Interpret the off-screen time and glance counts against the averages and explain what they suggest about the customer's focus. At least one paragraph."
    },
    overallAssessment: {
      0: "Combine the answers, the overall attitude and the analysis results into a thorough assessment naming strengths and areas for development. At least three paragraphs.",
      1: "Combine the answers, the overall attitude and the analysis results into a thorough assessment naming strengths and areas for development. At least three paragraphs."
    },
    conclusions: {
      0: "Write this section for HR professionals only. Reach a clear conclusion on fit for the position and give concrete hiring recommendations. Do not address the candidate. At least two paragraphs.",
      1: "Write one paragraph with a general assessment of the customer."
    },
    suitability: {
      0: (score) =>
        "Produce an HTML section with a position-fit percentage (an integer from 0 to 100) and one or two paragraphs explaining it. " +
        `Base the percentage on the LLM score ${score}. Use this shape: ` +
        suitabilitySection(enHeadings.suitability, "Position Fit: 85%", "…"),
      1: () => "Leave this placeholder exactly as it is."
    },
    rulesHeading: "Rules:",
    rules: [
      "All generated text must be in English.",
      "Keep the tone professional, formal and data driven.",
      "Do not add notes, explanations or meta commentary for the user.",
      "Reply with the filled-in HTML template only, and nothing else."
    ],
    templateHeading: "The template to fill in:"
  },
  narrative: {
    overview: (f) =>
      `${f.subjectName} completed the session "${f.sessionName}". ` +
      `The evaluated score was ${f.score} against a cohort average of ${f.averageScore}, which is ${trendWord(f.scoreTrend)} the cohort.`,
    emotion: (f) =>
      "The person's emotions were analysed from video and audio. " +
      `The dominant emotion was ${f.dominantEmotion.toLowerCase()} at ${f.dominantValue}%.`,
    attention: (f) =>
      `Off-screen time was ${f.offScreenSeconds} s across ${f.offScreenCount} glances, ` +
      `${trendWord(f.attentionTrend)} the cohort average of ${f.averageOffScreenSeconds} s.`,
    assessment: (f) =>
      `Taken together, the answers and the measured signals place ${f.subjectName} ${trendWord(f.scoreTrend)} the cohort.`,
    conclusions: {
      0: (f) => `A hiring decision should weigh the score of ${f.score} against the role's requirements.`,
      1: (f) => `${f.subjectName} engaged with the conversation ${f.scoreTrend === "below" ? "less" : "as much or more"} than the cohort.`
    },
    suitability: (f) =>
      suitabilitySection(
        enHeadings.suitability,
        `Position Fit: ${f.score}%`,
        `The fit percentage follows the evaluated score of ${f.score}.`
      )
  }
};

const trHeadings: ReportStrings["headings"] = {
  overview: "1) Genel Bakış",
  analysis: "2) Analiz",
  emotionAnalysis: "Duygu Analizi",
  attentionAnalysis: "Dikkat Analizi",
  overallAssessment: "3) Genel Değerlendirme",
  questionsAndAnswers: "4) Sorular ve Cevaplar",
  conclusions: "5) Sonuçlar ve Öneriler",
  suitability: "6) Pozisyona Uygunluk Değerlendirmesi"
};

const tr: ReportStrings = {
  reportTitle: { 0: "Mülakat Değerlendirme Raporu", 1: "Görüşme Değerlendirme Raporu" },
  headings: trHeadings,
  badgeLabel: "Pozisyona Uygunluk:",
  percent: (value) => `%${value}`,
  questionLabel: "Soru",
  answerLabel: "Cevap",
  emotionLabels: {
    happy: "Mutlu",
    angry: "Kızgın",
    disgust: "İğrenme",
    fear: "Korku",
    sad: "Üzgün",
    surprised: "Şaşkın",
    neutral: "Doğal"
  },
  chartTitles: { absolute: "Duygu Analizi", differential: "Duyguların Ortalamadan Farkı" },
  noChartData: "Görselleştirilecek duygu verisi yok.",
  prompt: {
    intro: "Aşağıdaki HTML şablonunu oturum verileriyle doldurarak eksiksiz bir HTML raporu döndür.",
    subjectLabel: { 0: "Aday adı", 1: "Müşteri adı" },
    sessionLabel: { 0: "Mülakat adı", 1: "Görüşme adı" },
    scoreLine: (score, average) => `LLM skoru: ${score}, ortalama LLM skoru: ${average}`,
    emotionLine: "Duygu analizi (%)",
    attentionLine: (seconds, count, avgSeconds, avgCount) =>
      `Dikkat analizi: ekran dışı süre ${seconds} sn, ekran dışı bakış sayısı ${count}, ` +
      `ortalama ekran dışı süre ${avgSeconds} sn, ortalama ekran dışı bakış sayısı ${avgCount}`,
    fieldsHeading: "Yer tutucular için talimatlar:",
    overview: {
      0: "Adayın performansını, iletişim becerilerini ve mülakatın akışını özetleyen en az iki paragraflık bir giriş yaz.",
      1: "Müşterinin iletişimini ve görüşmenin akışını özetleyen en az iki paragraflık bir giriş yaz."
    },
    emotionCommentary: {
      0: 'Yukarıdaki duygu yüzdelerini yorumla: hangi duygular baskın ve bu mülakat bağlamında ne anlama gelebilir. En az iki paragraf. İlk cümle tam olarak şu olmalı: "Görüntü ve ses analiz edilerek adayın duygu analizi yapılmıştır."',
      1: 'Yukarıdaki duygu yüzdelerini yorumla: hangi duygular baskın ve bu görüşme bağlamında ne anlama gelebilir. En az iki paragraf. İlk cümle tam olarak şu olmalı: "Görüntü ve ses analiz edilerek kişinin duygu analizi yapılmıştır."'
    },
    attentionCommentary: {
      0: "Ekran dışı süre ve bakış sayısını ortalamalarla karşılaştırarak adayın odaklanması hakkında ne söylediğini açıkla. En az bir paragraf.",
      1: "Ekran dışı süre ve bakış sayısını ortalamalarla karşılaştırarak müşterinin odaklanması hakkında ne söylediğini açıkla. En az bir paragraf."
    },
    overallAssessment: {
      0: "Cevapları, genel tavrı ve analiz sonuçlarını birleştirerek güçlü ve gelişime açık yönleri belirten kapsamlı bir değerlendirme yap. En az üç paragraf.",
      1: "Cevapları, genel tavrı ve analiz sonuçlarını birleştirerek güçlü ve gelişime açık yönleri belirten kapsamlı bir değerlendirme yap. En az üç paragraf."
    },
    conclusions: {
      0: "Bu bölümü yalnızca İnsan Kaynakları profesyonellerine yönelik yaz. Pozisyona uygunluk hakkında net bir sonuca var ve somut işe alım önerileri sun. Adaya hitap etme. En az iki paragraf.",
      1: "Müşteri hakkında genel bir değerlendirme içeren tek bir paragraf yaz."
    },
    suitability: {
      0: (score) =>
        "Pozisyona uygunluk yüzdesini (0-100 arası tam sayı) ve bunu destekleyen bir iki paragraflık açıklamayı HTML bölümü olarak üret. " +
        `Yüzdeyi ${score} LLM skoruna dayandır. Şu biçimi kullan: ` +
        suitabilitySection(trHeadings.suitability, "Pozisyona Uygunluk: %85", "…"),
      1: () => "Bu yer tutucuyu olduğu gibi bırak."
    },
    rulesHeading: "Kurallar:",
    rules: [
      "Üretilen tüm metin yalnızca Türkçe olmalıdır.",
      "Ton profesyonel, resmi ve veri odaklı olmalıdır.",
      "Kullanıcıya yönelik not, açıklama veya meta yorum ekleme.",
      "Yalnızca doldurulmuş HTML şablonuyla yanıt ver, başka metin ekleme."
    ],
    templateHeading: "Doldurman gereken şablon:"
  },
  narrative: {
    overview: (f) =>
      `${f.subjectName}, "${f.sessionName}" oturumunu tamamladı. ` +
      `Değerlendirme skoru ${f.score}, grup ortalaması ${f.averageScore}; skor ortalamanın ${trendWordTr(f.scoreTrend)}.`,
    emotion: (f) =>
      "Görüntü ve ses analiz edilerek kişinin duygu analizi yapılmıştır. " +
      `Baskın duygu %${f.dominantValue} ile ${f.dominantEmotion.toLocaleLowerCase("tr")} olmuştur.`,
    attention: (f) =>
      `Ekran dışı süre ${f.offScreenSeconds} sn, bakış sayısı ${f.offScreenCount}; ` +
      `süre, ${f.averageOffScreenSeconds} sn olan grup ortalamasının ${trendWordTr(f.attentionTrend)}.`,
    assessment: (f) =>
      `Cevaplar ve ölçülen sinyaller birlikte değerlendirildiğinde ${f.subjectName} grubun ${trendWordTr(f.scoreTrend)} konumdadır.`,
    conclusions: {
      0: (f) => `İşe alım kararında ${f.score} skoru pozisyonun gereksinimleriyle birlikte ele alınmalıdır.`,
      1: (f) => `${f.subjectName} görüşmeye grup ortalamasına ${f.scoreTrend === "below" ? "göre daha az" : "benzer ya da daha fazla"} katılım gösterdi.`
    },
    suitability: (f) =>
      suitabilitySection(
        trHeadings.suitability,
        `Pozisyona Uygunluk: %${f.score}`,
        `Uygunluk yüzdesi ${f.score} değerlendirme skorunu izler.`
      )
  }
};

function suitabilitySection(heading: string, fit: string, body: string): string {
  return `<div class="section"><h2>${heading}</h2><p class="fit">${fit}</p><p>${body}</p></div>`;
}

function trendWord(trend: NarrativeFacts["scoreTrend"]): string {
  if (trend === "above") return "above";
  if (trend === "below") return "below";
  return "level with";
}

function trendWordTr(trend: NarrativeFacts["scoreTrend"]): string {
  if (trend === "above") return "üzerinde";
  if (trend === "below") return "altında";
  return "seviyesinde";
}

const STRINGS: Record<ReportLocale, ReportStrings> = { en, tr };

export function getReportStrings(locale: ReportLocale): ReportStrings {
  return STRINGS[locale];
}
