import { registerDialectPolicy } from '@metaquery/core';

import { HIVE_POLICY } from './policy/hive-policy';

// Auto-register the Hive policy
registerDialectPolicy(HIVE_POLICY);

export { HIVE_POLICY };
