import { Injectable, Logger } from "@nestjs/common";
import { lifestyleRecordSchema } from "@habitlens/shared";
import type { FieldError, LifestyleRecord, ValidationResult } from "@habitlens/shared";
import type { ZodIssue } from "zod";
import { ValidationError } from "../common/errors";

const LIMITED_NUTRIENTS = ["calories", "protein", "carbohydrates", "fat", "sodium"] as const;

/** Per-item values above these are treated as entry mistakes. */
export const NUTRIENT_LIMITS: Record<(typeof LIMITED_NUTRIENTS)[number], number> = {
  calories: 5000,
  protein: 200,
  carbohydrates: 500,
  fat: 200,
  sodium: 5000,
};

const FREE_TEXT_FIELDS = new Set(["name", "notes"]);

const INJECTION_PATTERNS: readonly RegExp[] = [
  /<script[^>]*>[\s\S]*?<\/script>/gi,
  /<[^>]+>/g,
  /javascript:/gi,
  /\bon\w+\s*=/gi,
  /\b(SELECT|INSERT|UPDATE|DELETE|DROP)\b/gi,
  /\|\||&&|;|\$\(/g,
];

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function stripInjection(text: string): string {
  return collapse(INJECTION_PATTERNS.reduce((out, pattern) => out.replace(pattern, ""), text));
}

function sanitizeValue(value: unknown, key?: string): unknown {
  if (typeof value === "string") {
    return key !== undefined && FREE_TEXT_FIELDS.has(key) ? stripInjection(value) : collapse(value);
  }
  if (Array.isArray(value)) return value.map((item) => sanitizeValue(item, key));
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, sanitizeValue(v, k)]));
  }
  return value;
}

function fieldName(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join(".") : "general";
}

function suggestFix(issue: ZodIssue, field: string): string {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined"
        ? `'${field}' is required.`
        : `Provide a ${issue.expected} value for '${field}'.`;
    case "too_small":
      return `Use a value of at least ${issue.minimum}.`;
    case "too_big":
      return `Use a value of at most ${issue.maximum}.`;
    case "invalid_string":
      return "Use the expected format: HH:MM for times of day, ISO 8601 for timestamps.";
    case "invalid_enum_value":
      return `Use one of: ${issue.options.join(", ")}.`;
    default:
      return `Check the value of '${field}'.`;
  }
}

function consistencyErrors(record: LifestyleRecord): FieldError[] {
  const errors: FieldError[] = [];

  if (record.foodItems.length === 0 && !record.sleep && record.habits.length === 0) {
    errors.push({
      field: "general",
      message: "The record has no food items, sleep data or habits.",
      suggestedFix: "Log at least one meal, a night of sleep or a habit.",
    });
  }

  if (record.sleep && record.sleep.quality >= 8 && record.sleep.interruptions > 5) {
    errors.push({
      field: "sleep.interruptions",
      message: `A sleep quality of ${record.sleep.quality} is unlikely with ${record.sleep.interruptions} interruptions.`,
      suggestedFix: "Check the sleep quality rating and the number of interruptions.",
    });
  }

  const seen = new Set<string>();
  record.foodItems.forEach((item, i) => {
    const name = collapse(item.name).toLowerCase();
    if (seen.has(name)) {
      errors.push({
        field: `foodItems.${i}.name`,
        message: `"${item.name}" is listed more than once.`,
        suggestedFix: "Combine duplicate entries into one item with the total serving size.",
      });
    }
    seen.add(name);

    for (const nutrient of LIMITED_NUTRIENTS) {
      const value = item.nutrition[nutrient];
      const limit = NUTRIENT_LIMITS[nutrient];
      if (value > limit) {
        errors.push({
          field: `foodItems.${i}.nutrition.${nutrient}`,
          message: `${nutrient} of ${value} is above the plausible maximum of ${limit} for one item.`,
          suggestedFix: "Check the unit and serving size for this item.",
        });
      }
    }
  });

  return errors;
}

function toFieldError(issue: ZodIssue): FieldError {
  const field = fieldName(issue);
  return { field, message: issue.message, suggestedFix: suggestFix(issue, field) };
}

function toValidationError({ field, message, suggestedFix }: FieldError): ValidationError {
  return new ValidationError(field, message, suggestedFix);
}

@Injectable()
export class InputValidatorService {
  private readonly logger = new Logger(InputValidatorService.name);

  validate(input: unknown): ValidationResult<LifestyleRecord> {
    const parsed = lifestyleRecordSchema.safeParse(input);
    const errors: FieldError[] = parsed.success
      ? consistencyErrors(parsed.data)
      : parsed.error.issues.map(toFieldError);

    if (!parsed.success || errors.length > 0) {
      this.logger.debug(`Rejected lifestyle record: ${errors.map((e) => e.field).join(", ")}`);
      return { valid: false, errors };
    }
    return { valid: true, errors: [], value: parsed.data };
  }

  /** Cleans strings and fills a missing timestamp. Run before `validate`. */
  sanitize(input: unknown): unknown {
    const cleaned = sanitizeValue(input);
    if (typeof cleaned === "object" && cleaned !== null && !Array.isArray(cleaned) && !("timestamp" in cleaned)) {
      return { ...cleaned, timestamp: new Date().toISOString() };
    }
    return cleaned;
  }

  validateOrThrow(input: unknown): LifestyleRecord {
    const result = this.validate(input);
    if (!result.valid) throw toValidationError(result.errors[0]);
    return result.value;
  }

  /**
   * Shape check only, for records that already passed `validate` upstream.
   * Consistency rules are not applied.
   */
  parseRecord(input: unknown): LifestyleRecord {
    const parsed = lifestyleRecordSchema.safeParse(input);
    if (!parsed.success) throw toValidationError(toFieldError(parsed.error.issues[0]));
    return parsed.data;
  }
}
