import { Injectable } from "@nestjs/common";
import { INSIGHT_CATEGORY_CONFIG } from "@habitlens/shared";
import type {
  CauseEffectPair,
  EducationalContent,
  Insight,
  InsightCategory,
} from "@habitlens/shared";
import MEDICAL_TERMS from "./medical-terms.json";

const REPLACEMENTS: ReadonlyMap<string, string> = new Map(Object.entries(MEDICAL_TERMS));

// Longest first so "treatments" wins over "treat"
const MEDICAL_TERM_PATTERN = new RegExp(
  `\\b(${[...REPLACEMENTS.keys()].sort((a, b) => b.length - a.length).join("|")})\\b`,
  "gi",
);

export const DISCLAIMER =
  "This information is educational and describes general wellness patterns. " +
  "It is not medical advice; for questions about your health, talk with a qualified health professional.";

export const CONSULTATION_NOTE =
  "If this keeps happening or worries you, consider talking with a qualified health professional.";

const HEALTH_FACTORS = [
  "sleep",
  "sodium",
  "hydration",
  "water",
  "sugar",
  "stress",
  "caffeine",
  "metabolism",
  "digestion",
  "energy",
  "weight",
];

const CONCERN_INDICATORS = [
  "severe",
  "persistent",
  "very high",
  "very low",
  "poor quality",
  "was poor",
  "extreme",
  "chronic",
];

const CONSULT_ON_HIGH: readonly InsightCategory[] = ["sleep_recovery", "hydration", "nutrition"];

const CATEGORY_CONTEXT: Record<InsightCategory, string> = {
  nutrition:
    "Food choices shape how steady your energy feels across the day; small, repeatable swaps tend to last longer than big changes.",
  hydration:
    "The body keeps a close balance between water and salt, so both how much you drink and how much sodium you eat show up in how you feel.",
  sleep_recovery:
    "Sleep is when the body recovers, and the habits of the evening before often decide how restful it is.",
  metabolism:
    "Everyone uses energy a little differently; working with your own tendencies makes healthy habits easier to keep.",
  lifestyle_patterns:
    "Patterns become clearer the longer you log, and noticing them is the first step towards choosing which ones to keep.",
};

interface CauseEffectEntry extends CauseEffectPair {
  /** Lower-case words that make the pair relevant to an insight */
  keywords: readonly string[];
}

const CAUSE_EFFECT_LIBRARY: Record<InsightCategory, readonly CauseEffectEntry[]> = {
  nutrition: [
    {
      cause: "Highly processed foods",
      effect: "quicker hunger and energy dips",
      mechanism: "Refining strips out fibre and protein, so the food is digested fast and leaves you less full.",
      confidence: "well_established",
      keywords: ["processing", "junk"],
    },
    {
      cause: "Foods high in added sugar",
      effect: "energy spikes followed by slumps",
      mechanism: "Simple sugars are absorbed quickly, raising blood sugar sharply before it falls back.",
      confidence: "well_established",
      keywords: ["sugar"],
    },
    {
      cause: "Many preservatives in one food",
      effect: "a diet leaning on packaged rather than fresh food",
      mechanism: "Preservatives mostly appear in foods built for long shelf life, which tend to be more processed.",
      confidence: "supported",
      keywords: ["preservative"],
    },
    {
      cause: "Protein- and fibre-rich foods",
      effect: "longer-lasting fullness",
      mechanism: "Protein and fibre slow digestion, so energy is released more gradually.",
      confidence: "well_established",
      keywords: ["healthy", "density"],
    },
  ],
  hydration: [
    {
      cause: "High sodium intake",
      effect: "holding on to extra water",
      mechanism: "The body keeps more water to dilute extra salt back to its usual balance.",
      confidence: "well_established",
      keywords: ["sodium"],
    },
    {
      cause: "Drinking too little water",
      effect: "the body conserving fluid",
      mechanism: "When intake is low the kidneys hold back more water, which can leave you feeling puffy.",
      confidence: "supported",
      keywords: ["water", "hydration", "intake"],
    },
    {
      cause: "Short or poor sleep",
      effect: "more fluid retention the next day",
      mechanism: "Poor sleep raises stress hormones that influence how the body handles salt and water.",
      confidence: "theoretical",
      keywords: ["sleep"],
    },
  ],
  sleep_recovery: [
    {
      cause: "Caffeine late in the day",
      effect: "taking longer to fall asleep",
      mechanism: "Caffeine blocks adenosine, the signal that builds sleep pressure through the day.",
      confidence: "well_established",
      keywords: ["caffeine"],
    },
    {
      cause: "Eating close to bedtime",
      effect: "lighter, more restless sleep",
      mechanism: "Active digestion keeps the body working when it should be winding down.",
      confidence: "supported",
      keywords: ["eating", "late"],
    },
    {
      cause: "Evening screen light",
      effect: "a later sleep onset",
      mechanism: "Bright light in the evening holds back melatonin, the hormone that signals night-time.",
      confidence: "supported",
      keywords: ["screen"],
    },
    {
      cause: "High stress",
      effect: "less deep sleep",
      mechanism: "Stress hormones keep the body alert and make it harder to settle into deep sleep.",
      confidence: "well_established",
      keywords: ["stress"],
    },
    {
      cause: "Regular daytime exercise",
      effect: "deeper sleep",
      mechanism: "Physical activity builds the need for recovery that deep sleep provides.",
      confidence: "well_established",
      keywords: ["exercise"],
    },
  ],
  metabolism: [
    {
      cause: "Matching meals to your body type",
      effect: "steadier energy through the day",
      mechanism: "Macronutrient ratios suited to how you process carbohydrates and fats reduce energy swings.",
      confidence: "theoretical",
      keywords: ["energy", "carbohydrates", "protein"],
    },
  ],
  lifestyle_patterns: [
    {
      cause: "Changing one habit at a time",
      effect: "clearer links between habits and how you feel",
      mechanism: "With fewer things changing at once, the effect of each one is easier to spot in your log.",
      confidence: "supported",
      keywords: ["change", "rose", "fell"],
    },
    {
      cause: "Consistent daily routines",
      effect: "more predictable energy and sleep",
      mechanism: "The body clock adapts to regular timing of meals, activity and sleep.",
      confidence: "supported",
      keywords: ["steady", "repeats", "together"],
    },
  ],
};

function matchCase(matched: string, replacement: string): string {
  if (matched === matched.toUpperCase() && matched.length > 1) return replacement.toUpperCase();
  if (matched[0] === matched[0].toUpperCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

function mentionsAny(text: string, words: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return words.some((w) => lower.includes(w));
}

@Injectable()
export class EducationalContentService {
  /** Rewrites clinical vocabulary in an educational register. Idempotent. */
  ensureNonMedical(text: string): string {
    return text.replace(MEDICAL_TERM_PATTERN, (match) =>
      matchCase(match, REPLACEMENTS.get(match.toLowerCase()) ?? match),
    );
  }

  translate(insight: Insight): EducationalContent {
    const text = [insight.title, insight.summary, insight.detail, ...insight.rationale].join(" ");
    const explanation = [insight.detail, CATEGORY_CONTEXT[insight.category]];
    if (this.needsConsultation(insight, text)) explanation.push(CONSULTATION_NOTE);

    const healthRelated =
      INSIGHT_CATEGORY_CONFIG[insight.category].healthRelated || mentionsAny(text, HEALTH_FACTORS);

    return {
      insightId: insight.id,
      category: insight.category,
      mainMessage: this.ensureNonMedical(insight.summary),
      explanation: this.ensureNonMedical(explanation.join(" ")),
      causeEffect: this.causeEffectFor(insight.category, text),
      disclaimer: healthRelated ? DISCLAIMER : null,
    };
  }

  private needsConsultation(insight: Insight, text: string): boolean {
    return (
      mentionsAny(text, CONCERN_INDICATORS) ||
      (insight.priority === "high" && CONSULT_ON_HIGH.includes(insight.category))
    );
  }

  private causeEffectFor(category: InsightCategory, text: string): CauseEffectPair[] {
    const library = CAUSE_EFFECT_LIBRARY[category];
    const matching = library.filter((entry) => mentionsAny(text, entry.keywords));
    return (matching.length > 0 ? matching : library.slice(0, 1)).map(
      ({ cause, effect, mechanism, confidence }) => ({
        cause: this.ensureNonMedical(cause),
        effect: this.ensureNonMedical(effect),
        mechanism: this.ensureNonMedical(mechanism),
        confidence,
      }),
    );
  }
}
