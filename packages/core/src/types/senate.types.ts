/**
 * A member of the assembly.
 *
 * `rank` is a non-negative integer; it orders event delivery (higher first)
 * and decides who may interrupt whom.
 */
export interface Senator {
  id: string;
  name: string;
  faction: string;
  rank: number;
}

/** String literal constants for a senator's position on a topic */
export const STANCES = {
  SUPPORT: 'support',
  OPPOSE: 'oppose',
  NEUTRAL: 'neutral',
} as const;

/** Union type of all stances */
export type Stance = (typeof STANCES)[keyof typeof STANCES];

export const ALL_STANCES: readonly Stance[] = Object.values(STANCES);

/**
 * Type guard for stance strings coming from configuration files or model output.
 */
export function isStance(value: unknown): value is Stance {
  return typeof value === 'string' && (ALL_STANCES as readonly string[]).includes(value);
}

/**
 * Text delivered in the original language of the chamber together with its translation.
 */
export interface BilingualText {
  original: string;
  translation: string;
}
