import { DelayPolicy } from './delay.js';
import { ForwardPolicy } from './forward.js';
import { PrePolicy } from './pre.js';
import type { Policy, PolicyKind, PolicySettings } from './types.js';

export * from './types.js';
export * from './base.js';
export * from './checker.js';
export * from './failure-log.js';
export * from './forward.js';
export * from './delay.js';
export * from './pre.js';

/**
 * Create a policy by kind.
 */
export function createPolicy(kind: PolicyKind, settings: Partial<PolicySettings> = {}): Policy {
  switch (kind) {
    case 'forward':
      return new ForwardPolicy(settings);
    case 'delay':
      return new DelayPolicy(settings);
    case 'pre':
      return new PrePolicy(settings);
  }
}
