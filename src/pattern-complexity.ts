/**
 * Heuristic cost estimate for a search pattern.
 *
 * The score is a weighted count of constructs that make backtracking engines slow
 * (nested or stacked quantifiers, lookarounds, backreferences, alternation), scaled by
 * group nesting depth and pattern length. It inspects the pattern text only and never
 * compiles it.
 *
 *   0-10 very-simple · 11-30 simple · 31-60 moderate · 61-100 complex
 *   101-200 very-complex · above 200 dangerous
 */

export type ComplexityLevel =
  | "very-simple"
  | "simple"
  | "moderate"
  | "complex"
  | "very-complex"
  | "dangerous";

export interface PatternComplexity {
  pattern: string;
  score: number;
  level: ComplexityLevel;
  risk: string;
  warnings: string[];
  /** Contribution of each construct, plus the multipliers that were applied. */
  details: Record<string, number>;
  patternLength: number;
}

const LEVELS: readonly { max: number; level: ComplexityLevel; risk: string }[] = [
  { max: 10, level: "very-simple", risk: "Very low: essentially a substring search" },
  { max: 30, level: "simple", risk: "Low: basic pattern matching" },
  { max: 60, level: "moderate", risk: "Medium: reasonable performance expected" },
  { max: 100, level: "complex", risk: "High: monitor performance on large files" },
  { max: 200, level: "very-complex", risk: "Very high: significant performance impact likely" },
];

const DANGEROUS = {
  level: "dangerous",
  risk: "Critical: catastrophic backtracking likely",
} as const;

function count(text: string, re: RegExp): number {
  return text.match(re)?.length ?? 0;
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function maxGroupDepth(pattern: string): number {
  let depth = 0;
  let max = 0;
  for (const ch of pattern) {
    if (ch === "(") max = Math.max(max, ++depth);
    else if (ch === ")") depth--;
  }
  return max;
}

export function analyzePattern(pattern: string): PatternComplexity {
  const details: Record<string, number> = {};
  const warnings: string[] = [];
  let score = 0;

  const nested =
    count(pattern, /\([^)]*[+*{][^)]*\)[+*{]/g) + count(pattern, /\([^)]*\|[^)]*\)[+*{]/g);
  if (nested > 0) {
    details.nestedQuantifiers = nested * 50;
    score += details.nestedQuantifiers;
    warnings.push(`Found ${nested} nested quantifier(s): catastrophic backtracking risk`);
  }

  const adjacent = count(pattern, /[.+*]\s*[.+*]/g);
  const dotStars = count(pattern, /\.\*/g);
  const dotPluses = count(pattern, /\.\+/g);
  const bareStars = count(pattern, /(?<!\\)\*/g);
  let greedy = adjacent * 25;
  const greedyParts: string[] = [];
  if (adjacent > 0) greedyParts.push(`${adjacent} adjacent greedy quantifier(s)`);
  if (dotStars >= 2) {
    greedy += (dotStars - 1) * 30;
    greedyParts.push(`${dotStars} .* pattern(s)`);
  }
  if (dotPluses >= 2) {
    greedy += (dotPluses - 1) * 25;
    greedyParts.push(`${dotPluses} .+ pattern(s)`);
  }
  if (bareStars >= 2) {
    greedy += (bareStars - 1) * 20;
    greedyParts.push(`${bareStars} bare * quantifier(s)`);
  }
  if (greedy > 0) {
    details.greedySequences = greedy;
    score += greedy;
    warnings.push(`Found ${greedyParts.join(", ")}: catastrophic backtracking risk`);
  }

  const overlapping = count(pattern, /\([^)]*\|[^)]*[^)]+\)[+*]/g);
  if (overlapping > 0) {
    details.overlappingGroups = overlapping * 30;
    score += details.overlappingGroups;
    warnings.push(`Found ${overlapping} potentially overlapping quantified group(s)`);
  }

  const lookarounds = count(pattern, /\(\?[=!<]/g);
  if (lookarounds > 0) {
    const nestedLookarounds = count(pattern, /\(\?[=!<][^)]*\(\?[=!<]/g);
    details.lookarounds = (lookarounds + nestedLookarounds) * 15;
    score += details.lookarounds;
    if (nestedLookarounds > 0) warnings.push(`Found ${nestedLookarounds} nested lookaround(s)`);
  }

  const backrefs = count(pattern, /\\[1-9]\d*/g);
  if (backrefs > 0) {
    details.backreferences = backrefs * 20;
    score += details.backreferences;
    warnings.push(`Found ${backrefs} backreference(s): matching is no longer regular`);
  }

  const pipes = pattern.split("|").length - 1;
  if (pipes > 0) {
    const nestedAlternation = count(pattern, /\([^)]*\|[^)]*\)[^)]*\|/g);
    details.alternation = pipes * 5 + nestedAlternation * 10;
    score += details.alternation;
    if (nestedAlternation > 0) warnings.push("Found nested alternation");
  }

  // A negated class counts twice.
  details.characterClasses = count(pattern, /\[[^\]]+\]/g) + count(pattern, /\[\^[^\]]+\]/g);
  details.quantifiers =
    count(pattern, /[^\\][+*?]|\{\d+,?\d*\}/g) * 3 + count(pattern, /[+*?]\?/g) * 2;
  details.anchors = count(pattern, /[\^$]|\\[bBAGzZ]/g);
  const literals = Math.max(0, pattern.length - count(pattern, /[\\()[\]{}|+*?.^$]/g));
  details.literals = round(literals * 0.1, 1);
  score += details.characterClasses + details.quantifiers + details.anchors + literals * 0.1;

  const depth = maxGroupDepth(pattern);
  if (depth > 1) {
    const multiplier = 1.5 ** (depth - 1);
    score *= multiplier;
    details.starHeightMultiplier = round(multiplier, 2);
    details.starHeightDepth = depth;
    if (depth >= 3) warnings.push(`Deep nesting (depth ${depth}): complexity multiplier applied`);
  }

  if (pattern.length > 20) {
    const multiplier = Math.log(pattern.length) / 10;
    score *= multiplier;
    details.lengthMultiplier = round(multiplier, 2);
  }

  score = round(score, 1);
  const band = LEVELS.find((l) => score <= l.max) ?? DANGEROUS;
  if (band.level === "dangerous") {
    warnings.push("This pattern may cause catastrophic backtracking");
  }

  return {
    pattern,
    score,
    level: band.level,
    risk: band.risk,
    warnings,
    details,
    patternLength: pattern.length,
  };
}
