// 아스널 API 파사드: 플레이어 단위 무기 조회/발동/진화/제작/스냅샷
// 전투 밖 확률 판정은 config.seed 로 만든 단일 RNG 스트림을 쓴다

import { Injectable, Logger } from '@nestjs/common';
import { ArsenalConfigService } from '../config/arsenal-config.service.js';
import {
  AlreadyAssignedError,
  CraftError,
  DuplicateIdError,
  InsufficientResourceError,
  InvalidInputError,
  MissingFieldError,
  NotEligibleError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { RngService, type Rng } from '../engine/rng/rng.service.js';
import { WeaponCatalogService } from '../engine/arsenal/weapon-catalog.service.js';
import {
  WeaponRegistryService,
  type TriggerOutcome,
} from '../engine/arsenal/weapon-registry.service.js';
import {
  ProgressionService,
  type EvolutionApplied,
  type EvolutionStatus,
  type LevelUpReport,
} from '../engine/progression/progression.service.js';
import { ComponentCatalogService } from '../engine/crafting/component-catalog.service.js';
import {
  CraftingService,
  type CraftFailure,
  type CraftOutcome,
  type CraftPreview,
  type DisassembleOutcome,
} from '../engine/crafting/crafting.service.js';
import {
  SnapshotService,
  type ArsenalSnapshot,
  type ImportCounts,
} from '../engine/snapshot/snapshot.service.js';
import {
  err,
  ok,
  type ActivationResult,
  type Component,
  type EvolutionPath,
  type EvolutionProgress,
  type Result,
  type WeaponInstance,
  type WeaponTemplate,
} from '../types/index.js';
import type { ActivationContextBody, TriggerBody } from './dto/activation.dto.js';
import type { CombatResultBody, ListTemplatesQuery } from './dto/weapon.dto.js';
import type { CraftBody, CraftPreviewBody, ListComponentsQuery } from './dto/craft.dto.js';

export interface WeaponView {
  instance: WeaponInstance;
  progress?: EvolutionProgress;
}

@Injectable()
export class ArsenalService {
  private readonly logger = new Logger(ArsenalService.name);
  private rng: Rng;

  constructor(
    config: ArsenalConfigService,
    private readonly rngService: RngService,
    private readonly catalog: WeaponCatalogService,
    private readonly components: ComponentCatalogService,
    private readonly registry: WeaponRegistryService,
    private readonly progression: ProgressionService,
    private readonly crafting: CraftingService,
    private readonly snapshot: SnapshotService,
  ) {
    this.rng = this.rngService.create(config.get().seed);
  }

  // --- 카탈로그 ---

  listTemplates(query: ListTemplatesQuery): WeaponTemplate[] {
    return this.catalog.listTemplates(query);
  }

  registerTemplate(
    body: unknown,
  ): Result<WeaponTemplate, MissingFieldError | DuplicateIdError | InvalidInputError> {
    return this.catalog.registerTemplate(body);
  }

  listComponents(query: ListComponentsQuery): Component[] {
    return this.components.listComponents(query.category);
  }

  registerComponent(
    body: unknown,
  ): Result<Component, MissingFieldError | DuplicateIdError | InvalidInputError> {
    return this.components.registerComponent(body);
  }

  // --- 무기 ---

  listWeapons(playerId: string): WeaponView[] {
    return this.registry.listInstances(playerId).map((instance) => this.toView(instance));
  }

  assignWeapon(playerId: string, templateId: string): Result<WeaponView, NotFoundError | AlreadyAssignedError> {
    const assigned = this.registry.assign(playerId, templateId);
    if (!assigned.ok) return assigned;
    return ok(this.toView(assigned.value));
  }

  getWeapon(playerId: string, weaponId: string): Result<WeaponView, NotFoundError> {
    const instance = this.findInstance(playerId, weaponId);
    if (!instance.ok) return instance;
    return ok(this.toView(instance.value));
  }

  removeWeapon(playerId: string, weaponId: string): Result<WeaponInstance, NotFoundError> {
    return this.registry.remove(playerId, weaponId);
  }

  checkActivation(playerId: string, weaponId: string, context: ActivationContextBody): ActivationResult {
    return this.registry.checkActivation(playerId, weaponId, context, this.rng);
  }

  trigger(
    playerId: string,
    weaponId: string,
    body: TriggerBody,
  ): Result<TriggerOutcome, NotFoundError | NotEligibleError | InsufficientResourceError> {
    const { effectId, targets, ...context } = body;
    return this.registry.trigger(playerId, weaponId, effectId, context, this.rng, { targets });
  }

  recharge(playerId: string, weaponId: string, amount: number): Result<WeaponInstance, NotFoundError> {
    return this.registry.recharge(playerId, weaponId, amount);
  }

  repair(playerId: string, weaponId: string, amount: number): Result<WeaponInstance, NotFoundError> {
    return this.registry.repair(playerId, weaponId, amount);
  }

  recordCombatResult(
    playerId: string,
    weaponId: string,
    stats: CombatResultBody,
  ): Result<LevelUpReport, NotFoundError> {
    const instance = this.findInstance(playerId, weaponId);
    if (!instance.ok) return instance;
    return this.progression.recordCombatResult(instance.value, stats);
  }

  // --- 진화 ---

  evolutionStatus(playerId: string, weaponId: string): Result<EvolutionStatus, NotFoundError> {
    const instance = this.findInstance(playerId, weaponId);
    if (!instance.ok) return instance;
    return this.progression.evolutionStatus(instance.value);
  }

  applyEvolution(
    playerId: string,
    weaponId: string,
    evolutionId: string,
  ): Result<EvolutionApplied, NotFoundError | NotEligibleError | InvalidInputError> {
    const instance = this.findInstance(playerId, weaponId);
    if (!instance.ok) return instance;
    return this.progression.applyEvolution(instance.value, evolutionId);
  }

  /** 무작위 진화 경로 생성 후 인스턴스에 추가 (적용은 별도) */
  generateRandomEvolution(
    playerId: string,
    weaponId: string,
  ): Result<EvolutionPath, NotFoundError | DuplicateIdError | InvalidInputError> {
    const instance = this.findInstance(playerId, weaponId);
    if (!instance.ok) return instance;
    const path = this.progression.generateRandomEvolution(instance.value, this.rng);
    return this.progression.addEvolutionPath(instance.value, path);
  }

  // --- 제작 ---

  previewCraft(body: CraftPreviewBody): Result<CraftPreview, CraftError> {
    return this.crafting.previewCraft(body.slots);
  }

  craft(playerId: string, body: CraftBody): Result<CraftOutcome, CraftFailure> {
    return this.crafting.craft({ playerId, ...body }, this.rng);
  }

  disassemble(playerId: string, weaponId: string): Result<DisassembleOutcome, NotFoundError | CraftError> {
    return this.crafting.disassemble(playerId, weaponId, this.rng);
  }

  // --- 스냅샷 ---

  exportSnapshot(): ArsenalSnapshot {
    return this.snapshot.exportState(this.rng.getState());
  }

  importSnapshot(raw: unknown): Result<ImportCounts, InvalidInputError> {
    const imported = this.snapshot.importState(raw);
    if (!imported.ok) return imported;
    const { rng } = imported.value.snapshot;
    if (rng) {
      this.rng = this.rngService.restore(rng);
      this.logger.log(`Arsenal RNG restored at cursor ${rng.cursor}`);
    }
    return ok(imported.value.counts);
  }

  private findInstance(playerId: string, weaponId: string): Result<WeaponInstance, NotFoundError> {
    const instance = this.registry.getInstance(playerId, weaponId);
    if (!instance) return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));
    return ok(instance);
  }

  private toView(instance: WeaponInstance): WeaponView {
    return { instance, progress: this.progression.getProgress(instance.playerId, instance.templateId) };
  }
}
