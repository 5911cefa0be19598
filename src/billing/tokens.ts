/**
 * Token Counting & Credit Conversion
 *
 * Credits are the billing unit; tokens are what providers report.
 * One credit buys `tokensPerCredit` tokens.
 */

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Character-based estimate, ~4 characters per token for English text.
 * Used when a provider response carries no usage block.
 */
export function countTokens(text: string): number {
  if (!text || text.length === 0) {
    return 0;
  }
  return Math.ceil(text.length / 4);
}

// =============================================================================
// CREDIT CONVERSION
// =============================================================================

export function creditsToTokens(credits: number, tokensPerCredit: number): number {
  return credits * tokensPerCredit;
}

/**
 * Whole credits needed to pay for `tokens`; never less than one.
 */
export function tokensToCredits(tokens: number, tokensPerCredit: number): number {
  return Math.max(1, Math.ceil(tokens / tokensPerCredit));
}

// =============================================================================
// BILLING ADJUSTMENT
// =============================================================================

export interface BillingAdjustment {
  /** Positive: charge more. Negative: refund. Zero: within threshold */
  deltaCredits: number;
  actualCredits: number;
  /** |actual − estimated| / estimated, over tokens */
  deviation: number;
}

/**
 * Compare the estimate with real usage. An adjustment is only due when the
 * token deviation exceeds `threshold` and the credit amounts differ.
 */
export function computeAdjustment(
  estimatedCredits: number,
  actualTokens: number,
  tokensPerCredit: number,
  threshold: number,
): BillingAdjustment {
  const estimatedTokens = creditsToTokens(estimatedCredits, tokensPerCredit);
  const actualCredits = tokensToCredits(actualTokens, tokensPerCredit);
  const deviation = estimatedTokens > 0 ? Math.abs(actualTokens - estimatedTokens) / estimatedTokens : 0;

  if (deviation <= threshold) {
    return { deltaCredits: 0, actualCredits, deviation };
  }
  return { deltaCredits: actualCredits - estimatedCredits, actualCredits, deviation };
}
