/**
 * Consensus tier order.
 *
 * The wire format is a `>`-delimited tier string, best tier first:
 *
 *   I>PI>UL>L>M>PM>PG>NF
 *
 * It is parsed once into a strict total order. Ranks run 0..k-1 in string
 * order and the not-found sentinel `NF` always holds rank k, the worst.
 */

/** Class assigned to a transcript an assembly has no record for. */
export const NOT_FOUND = "NF";

export const TIER_SEPARATOR = ">";

export class TierOrderError extends Error {
  public readonly rule: string;

  constructor(message: string, rule: string) {
    super(message);
    this.name = "TierOrderError";
    this.rule = rule;
  }

  format(): string {
    return `Invalid tier rule "${this.rule}": ${this.message}`;
  }
}

export interface TierOrder {
  /** Tiers in rank order, `NF` last */
  readonly tiers: readonly string[];
  /** Rank of a tier, or undefined for a value outside the order */
  rankOf(tier: string): number | undefined;
  has(tier: string): boolean;
  /** Wire form of the order */
  toString(): string;
}

/**
 * Parse a tier string into a strict total order.
 *
 * @throws TierOrderError on empty tiers, repeated tiers, or `NF` placed
 *   anywhere but last
 */
export function parseTierOrder(rule: string): TierOrder {
  const tokens = rule.split(TIER_SEPARATOR).map((token) => token.trim());

  if (tokens.length === 1 && tokens[0] === "") {
    throw new TierOrderError("rule names no tiers", rule);
  }

  const ranks = new Map<string, number>();
  tokens.forEach((token, index) => {
    if (token === "") {
      throw new TierOrderError(`empty tier at position ${index + 1}`, rule);
    }
    if (ranks.has(token)) {
      throw new TierOrderError(`tier "${token}" appears more than once`, rule);
    }
    if (token === NOT_FOUND && index !== tokens.length - 1) {
      throw new TierOrderError(`"${NOT_FOUND}" must be the last tier`, rule);
    }
    ranks.set(token, index);
  });

  if (!ranks.has(NOT_FOUND)) {
    ranks.set(NOT_FOUND, ranks.size);
  }

  const tiers = Object.freeze([...ranks.keys()]);

  return Object.freeze({
    tiers,
    rankOf: (tier: string) => ranks.get(tier),
    has: (tier: string) => ranks.has(tier),
    toString: () => tiers.join(TIER_SEPARATOR),
  });
}
