/**
 * Pairs a stored review type with one of a review page's sub-page options
 */

import { REVIEW_TYPE_RULES } from '../config/index.js';
import type { ReviewOption } from '../scraper/types.js';

export interface ReviewTypeRule {
  name: string;
  keywords: readonly string[];
}

export class ReviewOptionMatcher {
  private readonly rules: readonly ReviewTypeRule[];

  constructor(rules: readonly ReviewTypeRule[] = REVIEW_TYPE_RULES) {
    this.rules = rules.map((rule) => ({
      name: rule.name,
      keywords: rule.keywords.map((keyword) => keyword.toLowerCase()),
    }));
  }

  /**
   * The first rule whose keywords appear in the type picks the first option
   * carrying one of them. Without such an option, either text containing the
   * other (case-insensitive) is a match.
   */
  match(reviewType: string, options: readonly ReviewOption[]): ReviewOption | null {
    const type = reviewType.trim().toLowerCase();
    if (!type) {
      return null;
    }

    const rule = this.rules.find((candidate) => candidate.keywords.some((keyword) => type.includes(keyword)));
    if (rule) {
      const byRule = options.find((option) => {
        const text = option.text.toLowerCase();
        return rule.keywords.some((keyword) => text.includes(keyword));
      });
      if (byRule) {
        return byRule;
      }
    }

    return (
      options.find((option) => {
        const text = option.text.trim().toLowerCase();
        return text.length > 0 && (text.includes(type) || type.includes(text));
      }) ?? null
    );
  }
}
