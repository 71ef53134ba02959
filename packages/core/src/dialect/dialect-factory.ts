/**
 * Dialect Policy Factory
 *
 * Registry of named dialect policies. Dialect packages register their
 * policy on import, the same way adapters register their factories.
 */

import { ANSI_POLICY } from './ansi-policy';
import { DialectNotFoundError } from '../errors';

import type { DialectPolicy } from './dialect-policy';

const BUILT_IN_ALIASES: Record<string, string> = {
  default: 'ansi',
};

const policies = new Map<string, DialectPolicy>();

function seedBuiltIns(): void {
  policies.set(ANSI_POLICY.name, ANSI_POLICY);
}

seedBuiltIns();

export class DialectPolicyFactory {
  /**
   * Register (or replace) a policy under a name
   */
  static register(name: string, policy: DialectPolicy): void {
    policies.set(this.normalizeName(name), policy);
  }

  /**
   * Get a registered policy by name (case-insensitive)
   */
  static getPolicy(name: string): DialectPolicy {
    const policy = policies.get(this.normalizeName(name));
    if (!policy) {
      throw new DialectNotFoundError(name);
    }
    return policy;
  }

  /**
   * Check if a policy is registered under this name
   */
  static isSupported(name: string): boolean {
    return policies.has(this.normalizeName(name));
  }

  /**
   * Names of every registered policy
   */
  static listPolicies(): string[] {
    return [...policies.keys()];
  }

  /**
   * Drop every registration except the built-in ones (useful for testing)
   */
  static clear(): void {
    policies.clear();
    seedBuiltIns();
  }

  private static normalizeName(name: string): string {
    const lower = name.trim().toLowerCase();
    return BUILT_IN_ALIASES[lower] ?? lower;
  }
}

export function registerDialectPolicy(policy: DialectPolicy): void {
  DialectPolicyFactory.register(policy.name, policy);
}
