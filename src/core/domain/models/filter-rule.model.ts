/**
 * Replacement value that marks a rule as network link expansion
 * instead of a pattern substitution
 */
export const LINK_EXPANSION_SENTINEL = 'amz';

/**
 * FilterRule domain model - one step of the ordered rewrite chain
 * Rules are applied in ascending sortOrder, each seeing the previous output
 */
export class FilterRule {
  constructor(
    public readonly id: number,
    public pattern: string,
    public replacement: string,
    public sortOrder: number,
  ) {}

  /**
   * Check if this rule resolves matches over the network
   */
  isLinkExpansion(): boolean {
    return this.replacement === LINK_EXPANSION_SENTINEL;
  }
}

/**
 * Sort rules the way the chain applies them
 */
export function compareFilterRules(a: FilterRule, b: FilterRule): number {
  return a.sortOrder - b.sortOrder || a.id - b.id;
}
