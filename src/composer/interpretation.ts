/**
 * Score bands for composite interpretation. Lower bounds are inclusive;
 * anything below the last threshold is Very Weak.
 */

import { roundTo } from '@/utils/number';
import type { Side } from '@/indicators/types';
import type { Interpretation, SignalStrength } from './types';

interface Band {
  min: number;
  strength: SignalStrength;
}

export const BANDS: readonly Band[] = [
  { min: 0.8, strength: 'Very Strong' },
  { min: 0.6, strength: 'Strong' },
  { min: 0.4, strength: 'Moderate' },
  { min: 0.2, strength: 'Weak' },
  { min: Number.NEGATIVE_INFINITY, strength: 'Very Weak' },
];

interface BandText {
  description: string;
  color: string;
}

const TEXT: Record<Side, Record<SignalStrength, BandText>> = {
  bottom: {
    'Very Strong': {
      description: 'Multiple indicators suggest high probability of market bottom',
      color: 'green',
    },
    Strong: { description: 'Several indicators suggest potential market bottom', color: 'yellow-green' },
    Moderate: { description: 'Mixed signals with some bottom indicators present', color: 'yellow' },
    Weak: {
      description: 'Few bottom indicators present, market may continue declining',
      color: 'orange',
    },
    'Very Weak': {
      description: 'Bottom indicators not present, market likely to continue declining',
      color: 'red',
    },
  },
  top: {
    'Very Strong': {
      description: 'Multiple indicators suggest high probability of market top',
      color: 'red',
    },
    Strong: { description: 'Several indicators suggest potential market top', color: 'orange' },
    Moderate: { description: 'Mixed signals with some top indicators present', color: 'yellow' },
    Weak: {
      description: 'Few top indicators present, market may continue rising',
      color: 'yellow-green',
    },
    'Very Weak': {
      description: 'Top indicators not present, market likely to continue rising',
      color: 'green',
    },
  },
};

export function strengthFor(score: number): SignalStrength {
  const band = BANDS.find((candidate) => score >= candidate.min);
  return band ? band.strength : 'Very Weak';
}

export function interpretScore(side: Side, score: number): Interpretation {
  const strength = strengthFor(score);
  return {
    strength,
    ...TEXT[side][strength],
    score,
    percentage: roundTo(score * 100, 1),
  };
}
