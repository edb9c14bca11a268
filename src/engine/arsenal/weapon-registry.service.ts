// 플레이어별 무기 인스턴스: 충전/내구도/쿨다운 자원 관리, 효과 발동, 활성 효과 만료

import { Injectable, Logger } from '@nestjs/common';
import {
  AlreadyAssignedError,
  InsufficientResourceError,
  NotEligibleError,
  NotFoundError,
} from '../../common/errors/game-errors.js';
import type { RandomSource } from '../rng/rng.service.js';
import { ProgressionService, type LevelUpReport } from '../progression/progression.service.js';
import { WeaponCatalogService } from './weapon-catalog.service.js';
import { evaluateConditions, type ConditionOptions } from './trigger-conditions.js';
import {
  err,
  instanceKey,
  ok,
  type ActivationContext,
  type ActivationResult,
  type ActiveEffect,
  type EffectDescriptor,
  type Result,
  type TargetOutcome,
  type WeaponInstance,
} from '../../types/index.js';

export interface TriggerOptions extends ConditionOptions {
  /** ActiveEffect 에 기록할 대상 id */
  targets?: string[];
}

export interface TriggerOutcome {
  activeEffect: ActiveEffect;
  effect: EffectDescriptor;
  instance: WeaponInstance;
  experience?: LevelUpReport;
}

export type InstanceRemovedListener = (playerId: string, weaponId: string) => void;

@Injectable()
export class WeaponRegistryService {
  private readonly logger = new Logger(WeaponRegistryService.name);
  private readonly instances = new Map<string, WeaponInstance>();
  private activeEffects: ActiveEffect[] = [];
  private effectSeq = 0;
  private readonly removedListeners: InstanceRemovedListener[] = [];

  constructor(
    private readonly catalog: WeaponCatalogService,
    private readonly progression: ProgressionService,
  ) {}

  // --- 인스턴스 수명주기 ---

  assign(playerId: string, templateId: string): Result<WeaponInstance, NotFoundError | AlreadyAssignedError> {
    const template = this.catalog.getTemplate(templateId);
    if (!template) {
      return err(new NotFoundError(`Weapon template not found: ${templateId}`, { templateId }));
    }
    const key = instanceKey(playerId, templateId);
    if (this.instances.has(key)) {
      return err(new AlreadyAssignedError(playerId, templateId));
    }

    // effective 는 인스턴스 전용 사본: 카탈로그 원본은 건드리지 않는다
    const instance: WeaponInstance = {
      playerId,
      templateId,
      effective: structuredClone(template),
      currentCharge: 0,
      currentDurability: template.stats.durability,
      cooldowns: {},
      kills: 0,
      damageDealt: 0,
      specialTriggers: 0,
    };
    this.instances.set(key, instance);
    this.progression.createProgress(instance);

    this.logger.log(`Weapon assigned: ${templateId} → ${playerId}`);
    return ok(instance);
  }

  getInstance(playerId: string, weaponId: string): WeaponInstance | undefined {
    return this.instances.get(instanceKey(playerId, weaponId));
  }

  listInstances(playerId?: string): WeaponInstance[] {
    const all = [...this.instances.values()];
    return playerId === undefined ? all : all.filter((i) => i.playerId === playerId);
  }

  /** 인스턴스 + 진행도 + 활성 효과 삭제, 리스너(제작 기록 등)에 통지 */
  remove(playerId: string, weaponId: string): Result<WeaponInstance, NotFoundError> {
    const key = instanceKey(playerId, weaponId);
    const instance = this.instances.get(key);
    if (!instance) return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));

    this.instances.delete(key);
    this.progression.removeProgress(playerId, weaponId);
    this.activeEffects = this.activeEffects.filter(
      (a) => !(a.playerId === playerId && a.weaponId === weaponId),
    );
    for (const listener of this.removedListeners) listener(playerId, weaponId);

    this.logger.log(`Weapon removed: ${weaponId} (${playerId})`);
    return ok(instance);
  }

  onRemove(listener: InstanceRemovedListener): void {
    this.removedListeners.push(listener);
  }

  // --- 활성화 ---

  checkActivation(
    playerId: string,
    weaponId: string,
    context: ActivationContext,
    rng: RandomSource,
  ): ActivationResult {
    const instance = this.getInstance(playerId, weaponId);
    if (!instance) {
      return { eligible: false, reason: 'WEAPON_NOT_FOUND', message: `Weapon not found: ${weaponId}` };
    }
    if (instance.currentDurability <= 0) {
      return { eligible: false, reason: 'WEAPON_BROKEN', message: `${instance.effective.name} is broken` };
    }
    if (instance.effective.effects.length === 0) {
      return { eligible: false, reason: 'NO_EFFECTS', message: `${instance.effective.name} has no special effects` };
    }

    this.pruneCooldowns(instance, context.time);
    const ready = instance.effective.effects.filter((e) => !this.isOnCooldown(instance, e.id, context.time));
    if (ready.length === 0) {
      return { eligible: false, reason: 'ALL_ON_COOLDOWN', message: 'All effects are on cooldown' };
    }

    const eligible: EffectDescriptor[] = [];
    const failures: string[] = [];
    for (const effect of ready) {
      const outcome = evaluateConditions(effect.triggerConditions, instance, context, rng);
      if (outcome.passed) eligible.push(effect);
      else failures.push(`${effect.id}: ${outcome.message}`);
    }
    if (eligible.length === 0) {
      return { eligible: false, reason: 'CONDITIONS_UNMET', message: failures.join('; ') };
    }
    return { eligible: true, effects: eligible };
  }

  /**
   * 효과 발동. 모든 검사를 차감 전에 끝내므로 실패한 발동은 인스턴스를 바꾸지 않는다.
   * 확률 판정은 자원 검사 뒤에 한 번만.
   */
  trigger(
    playerId: string,
    weaponId: string,
    effectId: string,
    context: ActivationContext,
    rng: RandomSource,
    options: TriggerOptions = {},
  ): Result<TriggerOutcome, NotFoundError | NotEligibleError | InsufficientResourceError> {
    const instance = this.getInstance(playerId, weaponId);
    if (!instance) return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));

    const effect = instance.effective.effects.find((e) => e.id === effectId);
    if (!effect) return err(new NotFoundError(`Effect not found: ${effectId}`, { weaponId, effectId }));

    if (instance.currentDurability <= 0) {
      return err(new NotEligibleError(`${instance.effective.name} is broken`, { weaponId }));
    }

    this.pruneCooldowns(instance, context.time);
    const expiry = instance.cooldowns[effectId];
    if (expiry !== undefined && expiry > context.time) {
      return err(new InsufficientResourceError('COOLDOWN', expiry, context.time));
    }

    if (instance.currentCharge < effect.costs.charge) {
      return err(new InsufficientResourceError('CHARGE', effect.costs.charge, instance.currentCharge));
    }
    if (instance.currentDurability < effect.costs.durability) {
      return err(new InsufficientResourceError('DURABILITY', effect.costs.durability, instance.currentDurability));
    }

    const conditions = evaluateConditions(effect.triggerConditions, instance, context, rng, options);
    if (!conditions.passed) {
      return err(
        new NotEligibleError(`Conditions unmet for ${effectId}: ${conditions.message}`, {
          effectId,
          failed: conditions.failed,
        }),
      );
    }

    // --- 여기부터 확정 ---
    instance.currentCharge -= effect.costs.charge;
    instance.currentDurability -= effect.costs.durability;
    if (effect.cooldown > 0) {
      instance.cooldowns[effectId] = context.time + effect.cooldown;
    }
    instance.specialTriggers++;

    const activeEffect: ActiveEffect = {
      id: `${playerId}_${weaponId}_${effectId}_${++this.effectSeq}`,
      playerId,
      weaponId,
      effectId,
      effect: structuredClone(effect),
      startTime: context.time,
      endTime: context.time + effect.duration,
      targets: options.targets ?? [],
      results: [],
    };
    this.activeEffects.push(activeEffect);

    const granted = this.progression.grantExperience(instance, 'EFFECT_TRIGGERED', effect.rarity * 100);
    this.logger.debug(`${effectId} triggered by ${playerId}/${weaponId} at t=${context.time}`);

    return ok({
      activeEffect,
      effect,
      instance,
      experience: granted.ok ? granted.value : undefined,
    });
  }

  /** 해석 결과를 활성 효과 로그에 남긴다 */
  recordResults(activeEffectId: string, results: TargetOutcome[]): void {
    const active = this.activeEffects.find((a) => a.id === activeEffectId);
    if (!active) return;
    active.results.push(...results);
    for (const r of results) {
      if (!active.targets.includes(r.targetId)) active.targets.push(r.targetId);
    }
  }

  /**
   * endTime <= currentTime 인 활성 효과를 제거해 반환, 만료된 쿨다운 정리.
   * 논리 시각은 전투 세션마다 따로 흐르므로 playerIds 를 주면 그 플레이어들만 대상으로 한다.
   */
  tick(currentTime: number, playerIds?: readonly string[]): ActiveEffect[] {
    const inScope = (playerId: string): boolean => playerIds === undefined || playerIds.includes(playerId);
    const expired = this.activeEffects.filter((a) => inScope(a.playerId) && a.endTime <= currentTime);
    this.activeEffects = this.activeEffects.filter((a) => !expired.includes(a));
    for (const instance of this.instances.values()) {
      if (inScope(instance.playerId)) this.pruneCooldowns(instance, currentTime);
    }
    return expired;
  }

  listActiveEffects(playerId?: string): ActiveEffect[] {
    return playerId === undefined
      ? [...this.activeEffects]
      : this.activeEffects.filter((a) => a.playerId === playerId);
  }

  // --- 자원 ---

  recharge(playerId: string, weaponId: string, amount: number): Result<WeaponInstance, NotFoundError> {
    const instance = this.getInstance(playerId, weaponId);
    if (!instance) return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));
    instance.currentCharge = Math.min(
      instance.effective.stats.maxCharge,
      Math.max(0, instance.currentCharge + amount),
    );
    return ok(instance);
  }

  repair(playerId: string, weaponId: string, amount: number): Result<WeaponInstance, NotFoundError> {
    const instance = this.getInstance(playerId, weaponId);
    if (!instance) return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));
    instance.currentDurability = Math.min(
      instance.effective.stats.durability,
      Math.max(0, instance.currentDurability + amount),
    );
    return ok(instance);
  }

  recordDamage(playerId: string, weaponId: string, amount: number): void {
    const instance = this.getInstance(playerId, weaponId);
    if (instance) instance.damageDealt += Math.max(0, amount);
  }

  recordKill(playerId: string, weaponId: string, count = 1): void {
    const instance = this.getInstance(playerId, weaponId);
    if (instance) instance.kills += count;
  }

  // --- 스냅샷 ---

  replaceAll(instances: WeaponInstance[], activeEffects: ActiveEffect[]): void {
    this.instances.clear();
    for (const i of instances) this.instances.set(instanceKey(i.playerId, i.templateId), i);
    this.activeEffects = [...activeEffects];
    // id 끝의 일련번호 최댓값부터 이어서 발급
    this.effectSeq = Math.max(0, ...activeEffects.map((a) => Number(a.id.split('_').pop()) || 0));
  }

  private isOnCooldown(instance: WeaponInstance, effectId: string, time: number): boolean {
    const expiry = instance.cooldowns[effectId];
    return expiry !== undefined && expiry > time;
  }

  private pruneCooldowns(instance: WeaponInstance, time: number): void {
    for (const [effectId, expiry] of Object.entries(instance.cooldowns)) {
      if (expiry <= time) delete instance.cooldowns[effectId];
    }
  }
}
