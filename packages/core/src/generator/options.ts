import { RENDER_DEFAULTS } from '../constants';
import { ANSI_POLICY } from '../dialect/ansi-policy';
import { DialectPolicyFactory } from '../dialect/dialect-factory';
import { noopLogger } from '../logging';

import type { DialectPolicy } from '../dialect/dialect-policy';
import type { Logger } from '../types';

export interface GeneratorOptions {
  /** Receives a debug line per render and a warning per failure */
  logger?: Logger;
  /** Separator placed between rendered lines (default `\n`) */
  lineSeparator?: string;
  /**
   * Fail with UnsupportedConstructError instead of silently dropping
   * SELECT aliases or replacing a comma FROM list with JOINs
   */
  strictCapabilities?: boolean;
  /** Policy (or registered policy name) used when render() is given none */
  defaultPolicy?: DialectPolicy | string;
}

export interface ResolvedGeneratorOptions {
  readonly logger: Logger;
  readonly lineSeparator: string;
  readonly strictCapabilities: boolean;
  readonly defaultPolicy: DialectPolicy;
}

export function resolvePolicy(policy: DialectPolicy | string): DialectPolicy {
  return typeof policy === 'string' ? DialectPolicyFactory.getPolicy(policy) : policy;
}

export function resolveGeneratorOptions(options: GeneratorOptions = {}): ResolvedGeneratorOptions {
  return {
    logger: options.logger ?? noopLogger,
    lineSeparator: options.lineSeparator ?? RENDER_DEFAULTS.LINE_SEPARATOR,
    strictCapabilities: options.strictCapabilities ?? false,
    defaultPolicy: resolvePolicy(options.defaultPolicy ?? ANSI_POLICY),
  };
}
