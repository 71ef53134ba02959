/**
 * Dialect Policies
 *
 * Capability profiles consulted by the generator, plus the registry that
 * dialect packages register themselves into.
 *
 * @module dialect
 */

export {
  defineDialectPolicy,
  createOperatorEligibility,
  acceptAllPredicates,
  type DialectPolicy,
  type PredicateEligibility,
} from './dialect-policy';
export { ANSI_POLICY } from './ansi-policy';
export { DialectPolicyFactory, registerDialectPolicy } from './dialect-factory';
