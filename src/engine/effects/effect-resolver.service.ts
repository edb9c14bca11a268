// 효과 디스크립터 1개의 결과 계산: category 별 분기, 잘못된 입력은 success=false 로 반환

import { Injectable, Logger } from '@nestjs/common';
import { DamageService } from '../combat/damage.service.js';
import { StatusService } from '../status/status.service.js';
import type { RandomSource } from '../rng/rng.service.js';
import { UtilityService } from './utility.service.js';
import type { DamageEffect, StatusEffect, TargetOutcome } from '../../types/index.js';
import {
  failedResolution,
  type EffectResolution,
  type EffectResolutionInput,
} from './effect-resolution.js';

@Injectable()
export class EffectResolverService {
  private readonly logger = new Logger(EffectResolverService.name);

  constructor(
    private readonly damageService: DamageService,
    private readonly statusService: StatusService,
    private readonly utilityService: UtilityService,
  ) {}

  resolve(input: EffectResolutionInput, rng: RandomSource): EffectResolution {
    const { effect } = input;
    let resolution: EffectResolution;
    switch (effect.category) {
      case 'DAMAGE':
        resolution = this.resolveDamage(effect, input);
        break;
      case 'STATUS':
        resolution = this.resolveStatus(effect, input, rng);
        break;
      case 'UTILITY':
        resolution = this.utilityService.resolve(effect, input);
        break;
      default: {
        const unknown: { category?: unknown } = effect;
        resolution = failedResolution(`Unknown effect category: ${String(unknown.category)}`);
      }
    }
    this.logger.debug(`${input.effect.id}: ${resolution.message}`);
    return resolution;
  }

  resolveDamage(effect: DamageEffect, input: EffectResolutionInput): EffectResolution {
    const { primary, instance } = input;
    if (!primary) return failedResolution(`${effect.name} needs a target`, 'DAMAGE');
    if (primary.health <= 0) return failedResolution(`${primary.name} is already down`, 'DAMAGE');

    const targets = this.damageService.selectTargets(
      primary,
      input.candidates ?? [],
      input.distances ?? {},
      effect.aoeRadius,
      effect.maxTargets,
    );
    const damageType = effect.damageType ?? input.weapon.stats.damageType;

    const results: TargetOutcome[] = [];
    let totalDamage = 0;
    let kills = 0;
    for (const target of targets) {
      const breakdown = this.damageService.computeDamage(
        {
          damage: effect.damage,
          damageMultiplier: effect.damageMultiplier,
          armorPenetration: effect.armorPenetration,
          damageType,
        },
        input.weapon.stats.baseDamage,
        target,
      );
      const applied = this.damageService.applyDamage(target, breakdown.final);
      totalDamage += applied.dealt;
      if (applied.killed) kills++;
      results.push({
        targetId: target.id,
        kind: 'DAMAGE',
        amount: applied.dealt,
        detail: applied.killed ? 'KILLED' : damageType,
      });
    }

    if (instance) {
      instance.damageDealt += totalDamage;
      instance.kills += kills;
    }

    return {
      success: true,
      category: 'DAMAGE',
      message: `${effect.name} hits ${targets.length} target(s) for ${totalDamage} ${damageType} damage`,
      results,
      totalDamage,
      kills,
    };
  }

  resolveStatus(effect: StatusEffect, input: EffectResolutionInput, rng: RandomSource): EffectResolution {
    const { primary } = input;
    if (!primary) return failedResolution(`${effect.name} needs a target`, 'STATUS');

    const pool = [primary, ...(input.candidates ?? []).filter((c) => c.id !== primary.id)];
    const targets = pool.filter((c) => c.health > 0).slice(0, effect.maxTargets);
    if (targets.length === 0) return failedResolution(`${effect.name} has no living target`, 'STATUS');

    const results: TargetOutcome[] = [];
    let appliedCount = 0;
    for (const target of targets) {
      const application = this.statusService.tryApply(effect, target, input.time, rng, {
        playerId: input.instance?.playerId,
        weaponId: input.instance?.templateId,
        effectId: effect.id,
      });
      if (application.applied) appliedCount++;
      results.push({
        targetId: target.id,
        kind: 'STATUS',
        applied: application.applied,
        amount: application.chance,
        detail: application.skipped ? 'IMMUNE' : effect.statusType,
      });
    }

    return {
      success: true,
      category: 'STATUS',
      message: `${effect.name} applies ${effect.statusType} to ${appliedCount}/${targets.length} target(s)`,
      results,
      totalDamage: 0,
      kills: 0,
    };
  }
}
