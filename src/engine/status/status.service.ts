// 상태이상 / 타임드 modifier: 같은 타입 상태는 누적하지 않고 교체

import { Injectable } from '@nestjs/common';
import type { RandomSource } from '../rng/rng.service.js';
import type {
  BoostStat,
  Combatant,
  ModifierKind,
  StatusEffect,
  StatusRecord,
  TimedModifier,
} from '../../types/index.js';

export interface StatusDefinition {
  id: string;
  kind: 'DOT' | 'CC' | 'DEBUFF';
}

/** 알려진 상태 타입. 여기에 없는 타입도 적용은 되지만 라운드 효과가 없다 */
const STATUS_REGISTRY: Record<string, StatusDefinition> = {
  BURNING: { id: 'BURNING', kind: 'DOT' },
  BLEEDING: { id: 'BLEEDING', kind: 'DOT' },
  POISONED: { id: 'POISONED', kind: 'DOT' },
  PLASMA_BURN: { id: 'PLASMA_BURN', kind: 'DOT' },
  ELEMENTAL_BURN: { id: 'ELEMENTAL_BURN', kind: 'DOT' },
  NANITE_INFECTION: { id: 'NANITE_INFECTION', kind: 'DOT' },
  DISRUPTED: { id: 'DISRUPTED', kind: 'DEBUFF' },
  EMP_DISABLED: { id: 'EMP_DISABLED', kind: 'CC' },
  TIME_SLOWED: { id: 'TIME_SLOWED', kind: 'DEBUFF' },
  TIME_FROZEN: { id: 'TIME_FROZEN', kind: 'CC' },
  RANDOM_EFFECT: { id: 'RANDOM_EFFECT', kind: 'DEBUFF' },
};

export interface StatusSource {
  playerId?: string;
  weaponId?: string;
  effectId?: string;
}

export interface StatusApplication {
  targetId: string;
  applied: boolean;
  skipped: boolean;
  chance: number;
  record?: StatusRecord;
}

export interface DotTick {
  statusType: string;
  damage: number;
}

@Injectable()
export class StatusService {
  getDefinition(statusType: string): StatusDefinition | undefined {
    return STATUS_REGISTRY[statusType];
  }

  /** chance = max(0.05, applicationChance - statusResistance[type]) */
  applicationChance(effect: StatusEffect, target: Combatant): number {
    const resist = target.statusResistances[effect.statusType] ?? 0;
    return Math.max(0.05, effect.applicationChance - resist);
  }

  /** 대상별 1회 판정. 상태 면역 대상은 난수를 소비하지 않는다 */
  tryApply(
    effect: StatusEffect,
    target: Combatant,
    time: number,
    rng: RandomSource,
    source: StatusSource = {},
  ): StatusApplication {
    if (!target.canReceiveStatusEffects) {
      return { targetId: target.id, applied: false, skipped: true, chance: 0 };
    }

    const chance = this.applicationChance(effect, target);
    if (!rng.roll(chance)) {
      return { targetId: target.id, applied: false, skipped: false, chance };
    }

    const record: StatusRecord = {
      type: effect.statusType,
      strength: effect.statusStrength,
      startTime: time,
      endTime: time + effect.statusDuration,
      sourcePlayerId: source.playerId,
      sourceWeaponId: source.weaponId,
      sourceEffectId: effect.id,
    };
    target.statuses[effect.statusType] = record;
    return { targetId: target.id, applied: true, skipped: false, chance, record };
  }

  hasStatus(target: Combatant, statusType: string): boolean {
    return target.statuses[statusType] !== undefined;
  }

  /** endTime <= time 인 상태 제거, 제거된 타입 목록 반환 */
  expireStatuses(target: Combatant, time: number): string[] {
    const removed: string[] = [];
    for (const [type, record] of Object.entries(target.statuses)) {
      if (record.endTime <= time) {
        delete target.statuses[type];
        removed.push(type);
      }
    }
    return removed;
  }

  /** 라운드 시작 시 DOT: strength 만큼 피해 */
  tickDamageOverTime(target: Combatant): DotTick[] {
    const ticks: DotTick[] = [];
    if (target.health <= 0) return ticks;

    for (const record of Object.values(target.statuses)) {
      if (this.getDefinition(record.type)?.kind !== 'DOT') continue;
      const damage = Math.min(target.health, Math.max(0, Math.floor(record.strength)));
      if (damage <= 0) continue;
      target.health -= damage;
      ticks.push({ statusType: record.type, damage });
      if (target.health <= 0) break;
    }
    return ticks;
  }

  // --- modifier ---

  addModifier(target: Combatant, modifier: TimedModifier): void {
    // 같은 종류(BOOST 는 같은 stat)는 교체
    target.modifiers = target.modifiers.filter(
      (m) => !(m.kind === modifier.kind && m.stat === modifier.stat),
    );
    target.modifiers.push(modifier);
  }

  getModifier(target: Combatant, kind: ModifierKind): TimedModifier | undefined {
    return target.modifiers.find((m) => m.kind === kind);
  }

  removeModifier(target: Combatant, kind: ModifierKind): void {
    target.modifiers = target.modifiers.filter((m) => m.kind !== kind);
  }

  boostTotal(target: Combatant, stat: BoostStat): number {
    return target.modifiers
      .filter((m) => m.kind === 'BOOST' && m.stat === stat)
      .reduce((sum, m) => sum + m.value, 0);
  }

  expireModifiers(target: Combatant, time: number): TimedModifier[] {
    const expired = target.modifiers.filter((m) => m.endTime <= time);
    target.modifiers = target.modifiers.filter((m) => m.endTime > time);
    return expired;
  }
}
