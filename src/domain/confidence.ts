// =============================================================================
// Confidence Model — Pure entity & relationship confidence scoring
// =============================================================================

/** Clamp into [0, 1]; a NaN product scores 0. */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Confidence of an entity from its component factors.
 *
 * Repeated mentions (`frequencyFactor`, unbounded ≥ 0) can only boost the
 * score; `methodAgreement` moves it within an 80%–100% band.
 */
export function entityConfidence(
  base: number,
  contextFactor = 1.0,
  frequencyFactor = 0.0,
  methodAgreement = 0.0,
): number {
  const confidence =
    base * contextFactor * (1 + 0.2 * frequencyFactor) * (0.8 + 0.2 * methodAgreement);
  return clampConfidence(confidence);
}

/** Confidence of a relationship, capped by its weaker endpoint. */
export function relationshipConfidence(
  sourceConfidence: number,
  targetConfidence: number,
  relationStrength: number,
  contextSupport = 1.0,
): number {
  const endpoint = Math.min(sourceConfidence, targetConfidence);
  return clampConfidence(endpoint * relationStrength * contextSupport);
}
