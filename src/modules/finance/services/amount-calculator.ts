import type {
  CalculationStrategy,
  CourseLevel,
  LocationType,
  ScholarshipType,
  SocialCategory,
} from "../../../utils/constants.js";
import { ValidationError } from "../../../utils/errors.js";
import {
  addDecimals,
  centsToNumber,
  formatDecimal,
  multiplyDecimals,
  parseDecimal,
  toCents,
  type ExactDecimal,
} from "../../../utils/money.js";

export interface CalculationFactors {
  /** Approved amount when set, otherwise the requested amount. */
  baseAmount: number;
  cgpa?: number;
  courseLevel?: CourseLevel;
  scholarshipType?: ScholarshipType;
  familyIncome?: number;
  category?: SocialCategory;
  locationType?: LocationType;
  multipliers?: Record<string, number>;
  adjustments?: Record<string, number>;
}

export interface AmountBreakdown {
  tuition: number;
  maintenance: number;
  books: number;
}

export interface Recommendation {
  type: "warning" | "info" | "success";
  message: string;
  suggestion: string;
}

export interface CalculationResult {
  strategy: CalculationStrategy;
  /** Amount the multipliers apply to; the scheme base for government schemes. */
  baseAmount: number;
  multipliers: Record<string, number>;
  adjustments: Record<string, number>;
  finalAmount: number;
  breakdown: AmountBreakdown;
  recommendations: Recommendation[];
}

interface Band {
  min: number;
  multiplier: string;
}

// Highest band first; the first band whose floor is met wins.
const standardCgpaBands: Band[] = [
  { min: 9.0, multiplier: "1.2" },
  { min: 8.0, multiplier: "1.1" },
  { min: 7.0, multiplier: "1.0" },
  { min: 6.0, multiplier: "0.9" },
];
const standardCgpaFloor = "0.8";

const meritCgpaBands: Band[] = [
  { min: 9.5, multiplier: "1.5" },
  { min: 9.0, multiplier: "1.3" },
  { min: 8.5, multiplier: "1.2" },
  { min: 8.0, multiplier: "1.1" },
];
const meritCgpaFloor = "1.0";

// Upper bounds, inclusive
const incomeBrackets: { max: number; multiplier: string }[] = [
  { max: 100_000, multiplier: "1.5" },
  { max: 200_000, multiplier: "1.3" },
  { max: 400_000, multiplier: "1.1" },
  { max: 600_000, multiplier: "0.9" },
];
const incomeFloor = "0.7";

const standardCourseMultipliers: Record<CourseLevel, string> = {
  undergraduate: "1.0",
  postgraduate: "1.2",
  doctoral: "1.5",
  diploma: "0.8",
};

const needCourseAdjustments: Record<CourseLevel, string> = {
  undergraduate: "1.0",
  postgraduate: "1.1",
  doctoral: "1.2",
  diploma: "0.9",
};

const typeBonuses: Partial<Record<ScholarshipType, string>> = {
  research: "1.2",
  sports: "1.1",
  arts: "1.1",
  merit: "1.0",
};

const schemeBaseAmounts: Record<CourseLevel, string> = {
  undergraduate: "30000",
  postgraduate: "40000",
  doctoral: "60000",
  diploma: "20000",
};
const defaultSchemeBase = "30000";

const categoryMultipliers: Record<SocialCategory, string> = {
  sc: "1.2",
  st: "1.2",
  obc: "1.1",
  general: "1.0",
  minority: "1.15",
};

const locationMultipliers: Record<LocationType, string> = {
  rural: "1.1",
  urban: "1.0",
};

const breakdownShares = { tuition: "0.70", maintenance: "0.25" } as const;

const MULTIPLIER_MIN = 0.1;
const MULTIPLIER_MAX = 5.0;
const ADJUSTMENT_MIN = -50_000;
const ADJUSTMENT_MAX = 50_000;
/** Key of the combined custom multiplier in the result. */
export const COMBINED_MULTIPLIER = "total";

function band(value: number, bands: Band[], floor: string): string {
  return bands.find((candidate) => value >= candidate.min)?.multiplier ?? floor;
}

function incomeMultiplier(income: number): string {
  return incomeBrackets.find((bracket) => income <= bracket.max)?.multiplier ?? incomeFloor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function finite(name: string, value: number): number {
  if (!Number.isFinite(value)) throw new ValidationError(`${name} must be a finite number`, { [name]: value });
  return value;
}

interface Formula {
  base: ExactDecimal;
  multipliers: Record<string, string>;
  adjustments: Record<string, number>;
}

function standardFormula(factors: CalculationFactors): Formula {
  return {
    base: parseDecimal(factors.baseAmount),
    multipliers: {
      cgpa: band(factors.cgpa ?? 0, standardCgpaBands, standardCgpaFloor),
      course: factors.courseLevel ? standardCourseMultipliers[factors.courseLevel] : "1.0",
    },
    adjustments: {},
  };
}

function needBasedFormula(factors: CalculationFactors): Formula {
  return {
    base: parseDecimal(factors.baseAmount),
    multipliers: {
      income: incomeMultiplier(factors.familyIncome ?? 0),
      course: factors.courseLevel ? needCourseAdjustments[factors.courseLevel] : "1.0",
    },
    adjustments: {},
  };
}

function meritBasedFormula(factors: CalculationFactors): Formula {
  return {
    base: parseDecimal(factors.baseAmount),
    multipliers: {
      merit: band(factors.cgpa ?? 0, meritCgpaBands, meritCgpaFloor),
      typeBonus: (factors.scholarshipType && typeBonuses[factors.scholarshipType]) ?? "1.0",
    },
    adjustments: {},
  };
}

function governmentSchemeFormula(factors: CalculationFactors): Formula {
  return {
    base: parseDecimal(factors.courseLevel ? schemeBaseAmounts[factors.courseLevel] : defaultSchemeBase),
    multipliers: {
      category: categoryMultipliers[factors.category ?? "general"],
      location: locationMultipliers[factors.locationType ?? "urban"],
    },
    adjustments: {},
  };
}

function customFormula(factors: CalculationFactors): Formula {
  const multipliers: Record<string, string> = {};
  for (const [name, value] of Object.entries(factors.multipliers ?? {})) {
    if (name === COMBINED_MULTIPLIER) {
      throw new ValidationError(`multipliers.${name} is reserved for the combined multiplier`, { name });
    }
    multipliers[name] = String(clamp(finite(`multipliers.${name}`, value), MULTIPLIER_MIN, MULTIPLIER_MAX));
  }
  const adjustments: Record<string, number> = {};
  for (const [name, value] of Object.entries(factors.adjustments ?? {})) {
    adjustments[name] = clamp(finite(`adjustments.${name}`, value), ADJUSTMENT_MIN, ADJUSTMENT_MAX);
  }
  return { base: parseDecimal(factors.baseAmount), multipliers, adjustments };
}

const formulas: Record<CalculationStrategy, (factors: CalculationFactors) => Formula> = {
  standard: standardFormula,
  need_based: needBasedFormula,
  merit_based: meritBasedFormula,
  government_scheme: governmentSchemeFormula,
  custom: customFormula,
};

export function splitBreakdown(finalCents: bigint): AmountBreakdown {
  const total: ExactDecimal = { units: finalCents, scale: 2 };
  const tuition = toCents(multiplyDecimals(total, parseDecimal(breakdownShares.tuition)));
  const maintenance = toCents(multiplyDecimals(total, parseDecimal(breakdownShares.maintenance)));
  // Books absorb the rounding remainder so the parts always sum to the total.
  const books = finalCents - tuition - maintenance;
  return {
    tuition: centsToNumber(tuition),
    maintenance: centsToNumber(maintenance),
    books: centsToNumber(books),
  };
}

function recommend(factors: CalculationFactors, finalCents: bigint): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const baseCents = toCents(parseDecimal(factors.baseAmount));

  // final > 1.2 × base and final < 0.5 × base, compared in whole cents × 10
  if (finalCents * 10n > baseCents * 12n) {
    recommendations.push({
      type: "warning",
      message: "Calculated amount significantly exceeds the base amount",
      suggestion: "Review calculation parameters",
    });
  }
  if (finalCents * 10n < baseCents * 5n) {
    recommendations.push({
      type: "info",
      message: "Calculated amount is much lower than the base amount",
      suggestion: "Consider a need-based calculation",
    });
  }
  if ((factors.cgpa ?? 0) >= 9.0) {
    recommendations.push({
      type: "success",
      message: "Excellent academic performance",
      suggestion: "Consider merit-based enhancement",
    });
  }
  return recommendations;
}

/**
 * Computes a scholarship amount. Pure: the same strategy and factors always
 * give an identical result.
 */
export function calculate(strategy: CalculationStrategy, factors: CalculationFactors): CalculationResult {
  finite("baseAmount", factors.baseAmount);
  if (factors.baseAmount < 0) throw new ValidationError("baseAmount cannot be negative");
  if (factors.cgpa !== undefined && (finite("cgpa", factors.cgpa) < 0 || factors.cgpa > 10)) {
    throw new ValidationError("cgpa must be between 0 and 10");
  }
  if (factors.familyIncome !== undefined && finite("familyIncome", factors.familyIncome) < 0) {
    throw new ValidationError("familyIncome cannot be negative");
  }

  const formula = formulas[strategy](factors);
  const product = multiplyDecimals(formula.base, ...Object.values(formula.multipliers).map(parseDecimal));
  const total = addDecimals(product, ...Object.values(formula.adjustments).map((value) => parseDecimal(value)));

  const rawCents = toCents(total);
  const finalCents = rawCents < 0n ? 0n : rawCents;

  const multipliers: Record<string, number> = {};
  for (const [name, value] of Object.entries(formula.multipliers)) {
    multipliers[name] = Number(value);
  }
  if (strategy === "custom") {
    const combined = multiplyDecimals(...Object.values(formula.multipliers).map(parseDecimal));
    multipliers[COMBINED_MULTIPLIER] = Number(formatDecimal(combined));
  }

  return {
    strategy,
    baseAmount: centsToNumber(toCents(formula.base)),
    multipliers,
    adjustments: formula.adjustments,
    finalAmount: centsToNumber(finalCents),
    breakdown: splitBreakdown(finalCents),
    recommendations: recommend(factors, finalCents),
  };
}
