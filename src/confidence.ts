export type Confidence = 'high' | 'medium' | 'low' | 'unsure';

// Single total order used wherever confidence is compared or merged.
const RANK: Record<Confidence, number> = {
  high: 3,
  medium: 2,
  low: 1,
  unsure: 0,
};

export function compareConfidence(a: Confidence, b: Confidence): number {
  return RANK[a] - RANK[b];
}

export function maxConfidence(...levels: Confidence[]): Confidence {
  let best: Confidence = 'unsure';
  for (const level of levels) {
    if (RANK[level] > RANK[best]) best = level;
  }
  return best;
}
