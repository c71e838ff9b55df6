import { empty, produced, type Outcome } from '@rulegate/core';
import { getLogger } from '@rulegate/logger';
import { vi } from 'vitest';

import type { HandlerContext, RuleHandler } from '../registry/types.js';

export type ShiftRuleParams =
  | { kind: 'max-hours'; workerId: string; hours: number }
  | { kind: 'rest-period'; workerId: string; restHours: number }
  | { kind: 'certification'; workerId: string; certificate: string };

export const maxHours = (hours: number): ShiftRuleParams => ({ kind: 'max-hours', workerId: 'w-1', hours });
export const restPeriod = (restHours: number): ShiftRuleParams => ({ kind: 'rest-period', workerId: 'w-1', restHours });
export const certification = (certificate: string): ShiftRuleParams => ({
  kind: 'certification',
  workerId: 'w-1',
  certificate,
});

export function createContext(tag: string): HandlerContext {
  return { tag, signal: new AbortController().signal, logger: getLogger('test') };
}

/**
 * Call-counting stub handler that always returns `outcome`
 */
export function stubHandler<P extends ShiftRuleParams>(outcome: Outcome = empty()) {
  return vi.fn<RuleHandler<P>>(() => outcome);
}

export { empty, produced };
