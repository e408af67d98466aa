/**
 * Conversion reliability - How much meaning a conversion may lose
 */

export type ConversionReliabilityName =
  | 'PERFECT'
  | 'RELIABLE'
  | 'UNRELIABLE'
  | 'DANGEROUS';

export interface ConversionReliability {
  readonly name: ConversionReliabilityName;
  readonly cost: number;
}

export const ConversionReliability = {
  PERFECT: { name: 'PERFECT', cost: 1 },
  RELIABLE: { name: 'RELIABLE', cost: 7 },
  UNRELIABLE: { name: 'UNRELIABLE', cost: 25 },
  DANGEROUS: { name: 'DANGEROUS', cost: 30 },
} as const satisfies Record<ConversionReliabilityName, ConversionReliability>;

export const isBetterThan = (
  a: ConversionReliability,
  b: ConversionReliability
): boolean => a.cost < b.cost;

export const worstOf = (
  a: ConversionReliability,
  b: ConversionReliability
): ConversionReliability => (isBetterThan(a, b) ? b : a);
