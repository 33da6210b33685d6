import { normalizeTargets, parseTargetList } from '../config/config.js';

/**
 * Prefix filter deciding which targets get vlogged.
 *
 * A target passes when the rule set is empty or when it starts with one of the
 * rules. Matching is a plain, case-sensitive prefix test.
 */
export class TargetFilter {
  readonly rules: readonly string[];

  constructor(rules: readonly string[] = []) {
    this.rules = normalizeTargets(rules);
  }

  /** Builds a filter from a comma separated list such as `VLOG`. */
  static fromString(source: string | undefined): TargetFilter {
    return new TargetFilter(parseTargetList(source));
  }

  get allowsAll(): boolean {
    return this.rules.length === 0;
  }

  isEnabled(target: string): boolean {
    return this.allowsAll || this.rules.some((rule) => target.startsWith(rule));
  }
}
