/**
 * Tier Policy
 * Chooses which heading level becomes the top-level module tier
 */

export interface TierPolicy {
  selectTopLevel(levels: readonly number[]): number;
}

export interface SingleTitleTierPolicyOptions {
  titleLevel?: number;
  sectionLevel?: number;
  minSections?: number;
}

/**
 * A page with exactly one title heading and several section headings is
 * treated as one document whose sections are the modules. Otherwise the
 * shallowest level present wins.
 */
export class SingleTitleTierPolicy implements TierPolicy {
  private readonly titleLevel: number;
  private readonly sectionLevel: number;
  private readonly minSections: number;

  constructor(options: SingleTitleTierPolicyOptions = {}) {
    this.titleLevel = options.titleLevel ?? 1;
    this.sectionLevel = options.sectionLevel ?? 2;
    this.minSections = options.minSections ?? 3;
  }

  selectTopLevel(levels: readonly number[]): number {
    if (levels.length === 0) {
      return this.titleLevel;
    }

    const titles = levels.filter((level) => level === this.titleLevel).length;
    const sections = levels.filter((level) => level === this.sectionLevel).length;

    if (titles === 1 && sections >= this.minSections) {
      return this.sectionLevel;
    }
    return Math.min(...levels);
  }
}

export const defaultTierPolicy = new SingleTitleTierPolicy();
