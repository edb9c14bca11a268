// 무기 경험치 / 레벨 / 진화 슬롯: 진화는 인스턴스의 effective 템플릿만 바꾼다

import { Injectable, Logger } from '@nestjs/common';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import {
  DuplicateIdError,
  InvalidInputError,
  NotEligibleError,
  NotFoundError,
} from '../../common/errors/game-errors.js';
import type { RandomSource } from '../rng/rng.service.js';
import {
  EffectDescriptorSchema,
  EvolutionPathSchema,
  WeaponTemplateSchema,
  err,
  ok,
  type EffectDescriptor,
  type EffectPatch,
  type EvolutionPath,
  type EvolutionProgress,
  type ExperienceSource,
  type Rarity,
  type Result,
  type WeaponInstance,
  type WeaponTemplate,
} from '../../types/index.js';
import {
  ACCURACY_CAP,
  MINOR_EFFECTS,
  RANDOM_EVOLUTION_KINDS,
  RANDOM_EVOLUTION_LEVEL,
} from './evolution-tables.js';

export const EXPERIENCE_FACTOR: Record<ExperienceSource, number> = {
  DAMAGE_DEALT: 0.1,
  CRITICAL_HIT: 0.5,
  KILL: 2.0,
  EFFECT_TRIGGERED: 1.5,
};

/** 희귀할수록 느리게 성장 */
export const RARITY_DAMPENING: Record<Rarity, number> = {
  COMMON: 1.0,
  RARE: 0.8,
  EPIC: 0.6,
  LEGENDARY: 0.4,
  ARTIFACT: 0.2,
};

export const LEVEL_THRESHOLD_GROWTH = 1.5;
export const EVOLUTION_SLOT_EVERY = 3;

export interface LevelUpReport {
  experienceGained: number;
  previousLevel: number;
  level: number;
  levelsGained: number;
  experience: number;
  nextLevelExp: number;
  evolutionsGained: number;
  evolutionsAvailable: number;
}

export interface CombatResultStats {
  damageDealt: number;
  kills: number;
  criticalHits: number;
  effectsTriggered: number;
}

export interface EvolutionStatus {
  level: number;
  experience: number;
  nextLevelExp: number;
  /** 다음 레벨까지 진행률 (0~100) */
  progressPercent: number;
  evolutionsAvailable: number;
  appliedEvolutions: string[];
  available: EvolutionPath[];
  nextEvolution?: { id: string; name: string; levelRequirement: number; levelsNeeded: number };
}

export interface EvolutionApplied {
  evolution: EvolutionPath;
  effective: WeaponTemplate;
  progress: EvolutionProgress;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class ProgressionService {
  private readonly logger = new Logger(ProgressionService.name);
  /** playerId → weaponId → 진행도 (id 에 구분자가 들어가도 안전하도록 중첩) */
  private readonly progress = new Map<string, Map<string, EvolutionProgress>>();

  constructor(private readonly config: ArsenalConfigService) {}

  // --- 진행도 수명주기 (인스턴스와 함께 생성/삭제) ---

  createProgress(instance: WeaponInstance): EvolutionProgress {
    const created: EvolutionProgress = {
      level: 1,
      experience: 0,
      nextLevelExp: this.config.get().firstLevelExp,
      evolutionsAvailable: 0,
      appliedEvolutions: [],
    };
    this.store(instance.playerId, instance.templateId, created);
    return created;
  }

  getProgress(playerId: string, weaponId: string): EvolutionProgress | undefined {
    return this.progress.get(playerId)?.get(weaponId);
  }

  removeProgress(playerId: string, weaponId: string): void {
    const owned = this.progress.get(playerId);
    if (!owned) return;
    owned.delete(weaponId);
    if (owned.size === 0) this.progress.delete(playerId);
  }

  listProgress(): Array<{ playerId: string; weaponId: string; progress: EvolutionProgress }> {
    return [...this.progress.entries()].flatMap(([playerId, owned]) =>
      [...owned.entries()].map(([weaponId, progress]) => ({ playerId, weaponId, progress })),
    );
  }

  replaceAll(entries: Array<{ playerId: string; weaponId: string; progress: EvolutionProgress }>): void {
    this.progress.clear();
    for (const e of entries) this.store(e.playerId, e.weaponId, e.progress);
  }

  private store(playerId: string, weaponId: string, progress: EvolutionProgress): void {
    const owned = this.progress.get(playerId) ?? new Map<string, EvolutionProgress>();
    owned.set(weaponId, progress);
    this.progress.set(playerId, owned);
  }

  // --- 경험치 ---

  /** gain = floor(base * factor * dampening) 후 레벨 루프 */
  grantExperience(
    instance: WeaponInstance,
    source: ExperienceSource,
    baseExp: number,
  ): Result<LevelUpReport, NotFoundError> {
    const gained = Math.floor(
      Math.max(0, baseExp) * EXPERIENCE_FACTOR[source] * RARITY_DAMPENING[instance.effective.rarity],
    );
    return this.addExperience(instance, gained);
  }

  /** 전투 종료 집계: 0.1·피해 + 100·킬 + 20·치명타 + 50·효과, 희귀도 감쇠 */
  recordCombatResult(
    instance: WeaponInstance,
    stats: CombatResultStats,
  ): Result<LevelUpReport, NotFoundError> {
    const base =
      Math.floor(stats.damageDealt * 0.1) +
      stats.kills * 100 +
      stats.criticalHits * 20 +
      stats.effectsTriggered * 50;
    const gained = Math.floor(base * RARITY_DAMPENING[instance.effective.rarity]);
    return this.addExperience(instance, gained);
  }

  private addExperience(instance: WeaponInstance, gained: number): Result<LevelUpReport, NotFoundError> {
    const progress = this.getProgress(instance.playerId, instance.templateId);
    if (!progress) {
      return err(new NotFoundError(`No progress for ${instance.playerId}/${instance.templateId}`));
    }

    const previousLevel = progress.level;
    const previousSlots = progress.evolutionsAvailable;
    progress.experience += gained;

    while (progress.experience >= progress.nextLevelExp) {
      progress.experience -= progress.nextLevelExp;
      progress.level++;
      progress.nextLevelExp = Math.floor(progress.nextLevelExp * LEVEL_THRESHOLD_GROWTH);
      if (progress.level % EVOLUTION_SLOT_EVERY === 0) {
        progress.evolutionsAvailable++;
      }
      this.logger.log(`${instance.templateId} (${instance.playerId}) reached level ${progress.level}`);
    }

    return ok({
      experienceGained: gained,
      previousLevel,
      level: progress.level,
      levelsGained: progress.level - previousLevel,
      experience: progress.experience,
      nextLevelExp: progress.nextLevelExp,
      evolutionsGained: progress.evolutionsAvailable - previousSlots,
      evolutionsAvailable: progress.evolutionsAvailable,
    });
  }

  // --- 진화 ---

  /** 미적용 + 레벨 충족 + 선행 진화 모두 적용 */
  listAvailableEvolutions(instance: WeaponInstance): EvolutionPath[] {
    const progress = this.getProgress(instance.playerId, instance.templateId);
    if (!progress) return [];
    return instance.effective.evolutionPaths.filter(
      (path) =>
        !progress.appliedEvolutions.includes(path.id) &&
        progress.level >= path.levelRequirement &&
        path.prerequisites.every((id) => progress.appliedEvolutions.includes(id)),
    );
  }

  evolutionStatus(instance: WeaponInstance): Result<EvolutionStatus, NotFoundError> {
    const progress = this.getProgress(instance.playerId, instance.templateId);
    if (!progress) {
      return err(new NotFoundError(`No progress for ${instance.playerId}/${instance.templateId}`));
    }

    const upcoming = instance.effective.evolutionPaths
      .filter((p) => !progress.appliedEvolutions.includes(p.id) && p.levelRequirement > progress.level)
      .sort((a, b) => a.levelRequirement - b.levelRequirement)[0];

    return ok({
      level: progress.level,
      experience: progress.experience,
      nextLevelExp: progress.nextLevelExp,
      progressPercent: Math.floor((progress.experience / progress.nextLevelExp) * 100),
      evolutionsAvailable: progress.evolutionsAvailable,
      appliedEvolutions: [...progress.appliedEvolutions],
      available: this.listAvailableEvolutions(instance),
      nextEvolution: upcoming
        ? {
            id: upcoming.id,
            name: upcoming.name,
            levelRequirement: upcoming.levelRequirement,
            levelsNeeded: upcoming.levelRequirement - progress.level,
          }
        : undefined,
    });
  }

  applyEvolution(
    instance: WeaponInstance,
    evolutionId: string,
  ): Result<EvolutionApplied, NotFoundError | NotEligibleError | InvalidInputError> {
    const progress = this.getProgress(instance.playerId, instance.templateId);
    if (!progress) {
      return err(new NotFoundError(`No progress for ${instance.playerId}/${instance.templateId}`));
    }

    const path = instance.effective.evolutionPaths.find((p) => p.id === evolutionId);
    if (!path) return err(new NotFoundError(`Evolution not found: ${evolutionId}`, { evolutionId }));

    if (progress.appliedEvolutions.includes(evolutionId)) {
      return err(new NotEligibleError(`Evolution already applied: ${evolutionId}`, { evolutionId }));
    }
    if (progress.evolutionsAvailable <= 0) {
      return err(new NotEligibleError('No evolution slot available', { evolutionId }));
    }
    if (!this.listAvailableEvolutions(instance).some((p) => p.id === evolutionId)) {
      return err(
        new NotEligibleError(`Evolution requirements not met: ${evolutionId}`, {
          evolutionId,
          level: progress.level,
          levelRequirement: path.levelRequirement,
          prerequisites: path.prerequisites,
        }),
      );
    }

    const built = this.buildEvolvedTemplate(instance.effective, path);
    if (!built.ok) return built;

    // 검증이 끝난 뒤에만 반영
    instance.effective = built.value;
    instance.currentCharge = Math.min(instance.currentCharge, built.value.stats.maxCharge);
    instance.currentDurability = Math.min(instance.currentDurability, built.value.stats.durability);
    progress.evolutionsAvailable--;
    progress.appliedEvolutions.push(evolutionId);

    this.logger.log(`Evolution ${evolutionId} applied to ${instance.templateId} (${instance.playerId})`);
    return ok({ evolution: path, effective: built.value, progress });
  }

  private buildEvolvedTemplate(
    current: WeaponTemplate,
    path: EvolutionPath,
  ): Result<WeaponTemplate, InvalidInputError> {
    const effects: EffectDescriptor[] = [];
    for (const effect of current.effects) {
      const patch = path.changes.effectChanges[effect.id];
      if (!patch) {
        effects.push(effect);
        continue;
      }
      const patched = this.patchEffect(effect, patch);
      if (!patched.ok) return patched;
      effects.push(patched.value);
    }

    for (const effectId of Object.keys(path.changes.effectChanges)) {
      if (!current.effects.some((e) => e.id === effectId)) {
        return err(new InvalidInputError(`Evolution patches unknown effect: ${effectId}`, { effectId }));
      }
    }

    const newEffect = path.changes.newEffect;
    if (newEffect) {
      if (effects.some((e) => e.id === newEffect.id)) {
        return err(new InvalidInputError(`Effect already exists: ${newEffect.id}`, { effectId: newEffect.id }));
      }
      effects.push(newEffect);
    }

    const parsed = WeaponTemplateSchema.safeParse({
      ...current,
      stats: { ...current.stats, ...path.changes.stats },
      effects,
    });
    if (!parsed.success) {
      return err(new InvalidInputError('Evolution produces an invalid weapon', { issues: formatZodIssues(parsed.error) }));
    }
    return ok(parsed.data);
  }

  /** 키 단위 병합, triggerConditions/costs 는 필드 단위 */
  private patchEffect(effect: EffectDescriptor, patch: EffectPatch): Result<EffectDescriptor, InvalidInputError> {
    if (patch.id !== undefined && patch.id !== effect.id) {
      return err(new InvalidInputError(`Evolution cannot rename effect ${effect.id}`));
    }
    const merged: Record<string, unknown> = { ...effect };
    for (const [key, value] of Object.entries(patch)) {
      const existing = merged[key];
      merged[key] = isRecord(value) && isRecord(existing) ? { ...existing, ...value } : value;
    }
    const parsed = EffectDescriptorSchema.safeParse(merged);
    if (!parsed.success || parsed.data.category !== effect.category) {
      return err(
        new InvalidInputError(`Evolution patch invalid for effect ${effect.id}`, {
          issues: parsed.success ? ['category cannot change'] : formatZodIssues(parsed.error),
        }),
      );
    }
    return ok(parsed.data);
  }

  // --- 무작위 진화 ---

  /** 인스턴스 상태를 바탕으로 진화 경로 하나를 만든다 (등록은 addEvolutionPath) */
  generateRandomEvolution(instance: WeaponInstance, rng: RandomSource): EvolutionPath {
    const weapon = instance.effective;
    const suffix = rng.range(1000, 9999);
    const kinds = RANDOM_EVOLUTION_KINDS.filter(
      (k) => weapon.effects.length > 0 || (k !== 'EFFECT_POWER_UP' && k !== 'COOLDOWN_REDUCTION'),
    );
    const kind = rng.pick(kinds) ?? 'DAMAGE_BOOST';
    const base = { id: `random_evolution_${suffix}`, levelRequirement: RANDOM_EVOLUTION_LEVEL };

    switch (kind) {
      case 'DAMAGE_BOOST': {
        const inc = rng.range(5, 15);
        return EvolutionPathSchema.parse({
          ...base,
          name: 'Power Amplification',
          description: `Base damage +${inc}`,
          changes: { stats: { baseDamage: weapon.stats.baseDamage + inc } },
        });
      }
      case 'ACCURACY_IMPROVEMENT': {
        const inc = Math.round(rng.uniform(0.05, 0.15) * 100) / 100;
        return EvolutionPathSchema.parse({
          ...base,
          name: 'Improved Targeting',
          description: `Accuracy +${Math.round(inc * 100)}%`,
          changes: { stats: { accuracy: Math.min(ACCURACY_CAP, weapon.stats.accuracy + inc) } },
        });
      }
      case 'DURABILITY_INCREASE': {
        const inc = rng.range(20, 50);
        return EvolutionPathSchema.parse({
          ...base,
          name: 'Reinforced Structure',
          description: `Durability +${inc}`,
          changes: { stats: { durability: weapon.stats.durability + inc } },
        });
      }
      case 'CHARGE_ENHANCEMENT': {
        const charge = rng.range(20, 50);
        const rate = rng.range(2, 8);
        return EvolutionPathSchema.parse({
          ...base,
          name: 'Extended Capacitance',
          description: `Max charge +${charge}, charge rate +${rate}`,
          changes: {
            stats: {
              maxCharge: weapon.stats.maxCharge + charge,
              chargeRate: weapon.stats.chargeRate + rate,
            },
          },
        });
      }
      case 'EFFECT_POWER_UP': {
        const effect = rng.pick(weapon.effects) ?? weapon.effects[0];
        return EvolutionPathSchema.parse({
          ...base,
          name: `Upgrade: ${effect.name}`,
          description: `Strengthens ${effect.name}`,
          changes: { effectChanges: { [effect.id]: this.powerUpPatch(effect) } },
        });
      }
      case 'COOLDOWN_REDUCTION': {
        const effect = rng.pick(weapon.effects) ?? weapon.effects[0];
        const reduction = Math.max(1, Math.floor(effect.cooldown * 0.25));
        return EvolutionPathSchema.parse({
          ...base,
          name: 'Rapid Cooling',
          description: `${effect.name} cooldown -${reduction}`,
          changes: { effectChanges: { [effect.id]: { cooldown: Math.max(1, effect.cooldown - reduction) } } },
        });
      }
      case 'NEW_MINOR_EFFECT': {
        const template = MINOR_EFFECTS[weapon.category];
        const newEffect = EffectDescriptorSchema.parse({ ...template, id: `${template.id}_${suffix}` });
        return EvolutionPathSchema.parse({
          ...base,
          name: `Addition: ${newEffect.name}`,
          description: newEffect.description,
          changes: { newEffect },
        });
      }
    }
  }

  private powerUpPatch(effect: EffectDescriptor): EffectPatch {
    switch (effect.category) {
      case 'DAMAGE':
        return { damage: effect.damage + Math.floor(effect.damage * 0.2) };
      case 'STATUS':
        return {
          statusDuration: effect.statusDuration + 1,
          statusStrength: effect.statusStrength + 1,
        };
      case 'UTILITY':
        switch (effect.utilityType) {
          case 'SHIELD':
          case 'HEAL':
            return { amount: effect.amount + Math.floor(effect.amount * 0.3) };
          case 'TELEPORT':
            return { distance: effect.distance + 2 };
          default:
            return { cooldown: Math.max(0, effect.cooldown - 1) };
        }
    }
  }

  addEvolutionPath(
    instance: WeaponInstance,
    path: unknown,
  ): Result<EvolutionPath, DuplicateIdError | InvalidInputError> {
    const parsed = EvolutionPathSchema.safeParse(path);
    if (!parsed.success) {
      return err(new InvalidInputError('Invalid evolution path', { issues: formatZodIssues(parsed.error) }));
    }
    if (instance.effective.evolutionPaths.some((p) => p.id === parsed.data.id)) {
      return err(new DuplicateIdError('Evolution path', parsed.data.id));
    }
    instance.effective.evolutionPaths.push(parsed.data);
    this.logger.log(`Evolution path ${parsed.data.id} added to ${instance.templateId} (${instance.playerId})`);
    return ok(parsed.data);
  }
}
