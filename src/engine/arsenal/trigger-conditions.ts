// 발동 조건 평가: 결정적 조건을 먼저, triggerChance 는 마지막에 한 번만 굴린다

import type { RandomSource } from '../rng/rng.service.js';
import type {
  ActivationContext,
  TriggerConditions,
  WeaponInstance,
} from '../../types/index.js';

export type ConditionOutcome = { passed: true } | { passed: false; failed: string; message: string };

const PASSED: ConditionOutcome = { passed: true };

export interface ConditionOptions {
  /** 같은 행동 안에서 이미 확률 판정을 통과한 경우 */
  skipChanceRoll?: boolean;
}

export function evaluateConditions(
  conditions: TriggerConditions,
  instance: WeaponInstance,
  context: ActivationContext,
  rng: RandomSource,
  options: ConditionOptions = {},
): ConditionOutcome {
  if (conditions.minCharge !== undefined && instance.currentCharge < conditions.minCharge) {
    return {
      passed: false,
      failed: 'minCharge',
      message: `charge ${instance.currentCharge} < ${conditions.minCharge}`,
    };
  }

  if (conditions.targetHealthBelow !== undefined) {
    const hp = context.targetHealthPercent ?? 100;
    if (hp >= conditions.targetHealthBelow) {
      return {
        passed: false,
        failed: 'targetHealthBelow',
        message: `target health ${hp}% >= ${conditions.targetHealthBelow}%`,
      };
    }
  }

  if (conditions.consecutiveHits !== undefined) {
    const hits = context.consecutiveHits ?? 0;
    if (hits < conditions.consecutiveHits) {
      return {
        passed: false,
        failed: 'consecutiveHits',
        message: `consecutive hits ${hits} < ${conditions.consecutiveHits}`,
      };
    }
  }

  if (conditions.enemyCount !== undefined) {
    const count = context.enemyCount ?? 0;
    if (count < conditions.enemyCount) {
      return {
        passed: false,
        failed: 'enemyCount',
        message: `enemy count ${count} < ${conditions.enemyCount}`,
      };
    }
  }

  if (conditions.requiresCritical === true && context.isCritical !== true) {
    return { passed: false, failed: 'requiresCritical', message: 'requires a critical hit' };
  }

  if (conditions.triggerChance !== undefined && !options.skipChanceRoll) {
    if (!rng.roll(conditions.triggerChance)) {
      return {
        passed: false,
        failed: 'triggerChance',
        message: `trigger chance ${conditions.triggerChance} failed`,
      };
    }
  }

  return PASSED;
}
