// src/services/confidence/ConfidenceScorer.ts

import { ConfidenceConfig } from '../../config';

export interface ConfidenceInputs {
  /** Relevance of the retrieved context, each in [0,1]. */
  relevanceScores: number[];
  /** Model self-assessment normalized to [0,1], when the model gave one. */
  selfRating: number | null;
}

export const DEFAULT_CONFIDENCE_CONFIG: ConfidenceConfig = {
  retrievalWeight: 0.6,
  selfWeight: 0.4,
  topK: 3,
  ungroundedCeiling: 0.5,
};

// Used when neither signal is available.
const NEUTRAL_CONFIDENCE = 0.5;

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

const round = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Blends retrieval relevance (top-k average) with the model's self-rating
 * using configurable weights. Answers without any retrieved grounding are
 * capped at the ungrounded ceiling.
 */
export class ConfidenceScorer {
  private readonly config: ConfidenceConfig;

  constructor(config: Partial<ConfidenceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIDENCE_CONFIG, ...config };
  }

  public retrievalSignal(relevanceScores: number[]): number | null {
    if (relevanceScores.length === 0) return null;
    const top = [...relevanceScores]
      .map(clampUnit)
      .sort((a, b) => b - a)
      .slice(0, Math.max(1, this.config.topK));
    return top.reduce((sum, score) => sum + score, 0) / top.length;
  }

  public score(inputs: ConfidenceInputs): number {
    const retrieval = this.retrievalSignal(inputs.relevanceScores);
    const self = inputs.selfRating === null ? null : clampUnit(inputs.selfRating);
    const { retrievalWeight, selfWeight, ungroundedCeiling } = this.config;

    let blended: number;
    if (retrieval !== null && self !== null) {
      blended = (retrievalWeight * retrieval + selfWeight * self) / (retrievalWeight + selfWeight);
    } else if (retrieval !== null) {
      blended = retrieval;
    } else if (self !== null) {
      blended = self;
    } else {
      blended = NEUTRAL_CONFIDENCE;
    }

    if (retrieval === null) {
      blended = Math.min(blended, ungroundedCeiling);
    }

    return round(clampUnit(blended));
  }
}
