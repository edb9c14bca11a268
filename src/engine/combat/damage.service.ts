// 피해 계산 / 대상 선정 / 피해 적용

import { Injectable } from '@nestjs/common';
import type { Combatant, DamageType } from '../../types/index.js';

export interface DamageInput {
  /** 고정 추가 피해 */
  damage: number;
  damageMultiplier: number;
  armorPenetration: number;
  damageType: DamageType;
}

export interface DamageBreakdown {
  total: number;
  resistance: number;
  final: number;
}

export interface AppliedDamage {
  targetId: string;
  /** 방어/보호막 반영 후 실제로 깎인 HP */
  dealt: number;
  absorbed: number;
  healthBefore: number;
  healthAfter: number;
  killed: boolean;
}

@Injectable()
export class DamageService {
  /**
   * 피해 계산:
   * total = damage + floor(baseDamage * multiplier)
   * resistance = max(0, res[type] - armorPenetration)
   * final = max(1, floor(total * (1 - resistance)))
   */
  computeDamage(input: DamageInput, baseDamage: number, target: Combatant): DamageBreakdown {
    const total = input.damage + Math.floor(baseDamage * input.damageMultiplier);
    const resistance = this.resistanceFor(target, input.damageType, input.armorPenetration);
    const final = Math.max(1, Math.floor(total * (1 - resistance)));
    return { total, resistance, final };
  }

  resistanceFor(target: Combatant, type: DamageType, armorPenetration: number): number {
    return Math.max(0, (target.resistances[type] ?? 0) - armorPenetration);
  }

  /**
   * 주 대상 + aoeRadius 안의 후보 (입력 순서), maxTargets 로 자름.
   * 거리 맵에 없는 후보는 범위 밖으로 본다.
   */
  selectTargets(
    primary: Combatant,
    candidates: Combatant[],
    distances: Record<string, number>,
    aoeRadius: number,
    maxTargets: number,
  ): Combatant[] {
    const selected: Combatant[] = [primary];
    if (aoeRadius <= 0) return selected;

    for (const c of candidates) {
      if (selected.length >= maxTargets) break;
      if (c.id === primary.id || c.health <= 0) continue;
      const d = distances[c.id];
      if (d === undefined || d > aoeRadius) continue;
      selected.push(c);
    }
    return selected;
  }

  /** 방어 시 절반, 이후 보호막이 흡수. HP 는 0 아래로 내려가지 않는다 */
  applyDamage(target: Combatant, amount: number): AppliedDamage {
    const healthBefore = target.health;
    let incoming = amount;

    // 방어해도 최소 피해 1 은 유지
    if (incoming > 0 && target.modifiers.some((m) => m.kind === 'DEFEND')) {
      incoming = Math.max(1, Math.floor(incoming / 2));
    }

    let absorbed = 0;
    for (const shield of target.modifiers.filter((m) => m.kind === 'SHIELD')) {
      if (incoming <= 0) break;
      const take = Math.min(shield.value, incoming);
      shield.value -= take;
      incoming -= take;
      absorbed += take;
    }
    target.modifiers = target.modifiers.filter((m) => m.kind !== 'SHIELD' || m.value > 0);

    target.health = Math.max(0, target.health - incoming);
    return {
      targetId: target.id,
      dealt: healthBefore - target.health,
      absorbed,
      healthBefore,
      healthAfter: target.health,
      killed: healthBefore > 0 && target.health <= 0,
    };
  }
}
