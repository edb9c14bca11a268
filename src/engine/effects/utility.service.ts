// 유틸리티 효과: 순간이동/은신/보호막/스캔/회복/충전 환급/강화

import { Injectable } from '@nestjs/common';
import { StatusService } from '../status/status.service.js';
import type { DamageType, TargetOutcome, UtilityEffect } from '../../types/index.js';
import {
  failedResolution,
  type EffectResolution,
  type EffectResolutionInput,
} from './effect-resolution.js';

/** 스캔 약점 후보: 이 순서에서 처음 나온 최솟값 */
const SCAN_TYPES: DamageType[] = ['PHYSICAL', 'ENERGY', 'THERMAL', 'CHEMICAL', 'EMP'];

@Injectable()
export class UtilityService {
  constructor(private readonly statusService: StatusService) {}

  resolve(effect: UtilityEffect, input: EffectResolutionInput): EffectResolution {
    const { actor, time } = input;
    const results: TargetOutcome[] = [];
    const endTime = time + effect.duration;

    switch (effect.utilityType) {
      case 'TELEPORT':
        results.push({
          targetId: actor.id,
          kind: 'TELEPORT',
          amount: effect.distance,
          detail: effect.direction,
        });
        return this.done(`${actor.name} blinks ${effect.distance} ${effect.direction}`, results);

      case 'STEALTH':
        this.statusService.addModifier(actor, {
          kind: 'STEALTH',
          value: effect.level,
          startTime: time,
          endTime,
          sourceEffectId: effect.id,
        });
        results.push({ targetId: actor.id, kind: 'STEALTH', amount: effect.level });
        return this.done(`${actor.name} enters stealth (level ${effect.level})`, results);

      case 'SHIELD':
        this.statusService.addModifier(actor, {
          kind: 'SHIELD',
          value: effect.amount,
          startTime: time,
          endTime,
          sourceEffectId: effect.id,
        });
        results.push({ targetId: actor.id, kind: 'SHIELD', amount: effect.amount });
        return this.done(`${actor.name} raises a ${effect.amount} point shield`, results);

      case 'BOOST':
        this.statusService.addModifier(actor, {
          kind: 'BOOST',
          stat: effect.stat,
          value: effect.bonus,
          startTime: time,
          endTime,
          sourceEffectId: effect.id,
        });
        results.push({ targetId: actor.id, kind: 'BOOST', amount: effect.bonus, detail: effect.stat });
        return this.done(`${actor.name} gains ${effect.stat} +${effect.bonus}`, results);

      case 'SCAN': {
        const pool = [
          ...(input.primary ? [input.primary] : []),
          ...(input.candidates ?? []).filter((c) => c.id !== input.primary?.id),
        ].filter((c) => c.side !== actor.side && c.health > 0);
        const scanned = pool.slice(0, effect.maxTargets);
        for (const enemy of scanned) {
          const outcome: TargetOutcome = { targetId: enemy.id, kind: 'SCAN' };
          if (effect.revealWeakness) {
            let weakest = SCAN_TYPES[0];
            let lowest = enemy.resistances[weakest] ?? 0;
            for (const type of SCAN_TYPES.slice(1)) {
              const value = enemy.resistances[type] ?? 0;
              if (value < lowest) {
                lowest = value;
                weakest = type;
              }
            }
            outcome.detail = weakest;
            outcome.amount = lowest;
          }
          results.push(outcome);
        }
        return this.done(`${actor.name} scans ${scanned.length} enemies`, results);
      }

      case 'HEAL': {
        const before = actor.health;
        const amount = effect.amount + Math.floor(actor.maxHealth * effect.percentage);
        actor.health = Math.min(actor.maxHealth, actor.health + amount);
        results.push({ targetId: actor.id, kind: 'HEAL', amount: actor.health - before });
        return this.done(`${actor.name} recovers ${actor.health - before} health`, results);
      }

      case 'CHARGE_REFUND': {
        const instance = input.instance;
        if (!instance) return failedResolution('Charge refund needs a weapon instance', 'UTILITY');
        const before = instance.currentCharge;
        instance.currentCharge = Math.min(
          instance.effective.stats.maxCharge,
          instance.currentCharge + effect.amount,
        );
        results.push({
          targetId: actor.id,
          kind: 'CHARGE_REFUND',
          amount: instance.currentCharge - before,
        });
        return this.done(`${instance.effective.name} regains ${instance.currentCharge - before} charge`, results);
      }

      default: {
        const unknown: { utilityType?: unknown } = effect;
        return failedResolution(`Unknown utility type: ${String(unknown.utilityType)}`, 'UTILITY');
      }
    }
  }

  private done(message: string, results: TargetOutcome[]): EffectResolution {
    return { success: true, category: 'UTILITY', message, results, totalDamage: 0, kills: 0 };
  }
}
