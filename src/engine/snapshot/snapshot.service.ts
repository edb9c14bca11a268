// 아스널 상태 스냅샷: 템플릿/부품/인스턴스/진행도/제작 기록/활성 효과를 JSON 호환 구조로

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import { WeaponCatalogService } from '../arsenal/weapon-catalog.service.js';
import { WeaponRegistryService } from '../arsenal/weapon-registry.service.js';
import { ComponentCatalogService } from '../crafting/component-catalog.service.js';
import { CraftingService } from '../crafting/crafting.service.js';
import { ProgressionService } from '../progression/progression.service.js';
import type { RngState } from '../rng/rng.service.js';
import {
  ActiveEffectSchema,
  ComponentSchema,
  CraftedWeaponRecordSchema,
  EvolutionProgressSchema,
  WeaponInstanceSchema,
  WeaponTemplateSchema,
  err,
  instanceKey,
  ok,
  type Result,
} from '../../types/index.js';

export const SNAPSHOT_VERSION = 'arsenal_snapshot_v1' as const;

export const ArsenalSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  templates: z.array(WeaponTemplateSchema),
  components: z.array(ComponentSchema),
  instances: z.array(WeaponInstanceSchema),
  progress: z.array(
    z.object({
      playerId: z.string().min(1),
      weaponId: z.string().min(1),
      progress: EvolutionProgressSchema,
    }),
  ),
  craftedRecords: z.array(CraftedWeaponRecordSchema),
  activeEffects: z.array(ActiveEffectSchema),
  /** 전투 밖 RNG 스트림 위치 */
  rng: z.object({ seed: z.string(), cursor: z.number().int().min(0) }).optional(),
});
export type ArsenalSnapshot = z.infer<typeof ArsenalSnapshotSchema>;

export interface ImportCounts {
  templates: number;
  components: number;
  instances: number;
  progress: number;
  craftedRecords: number;
  activeEffects: number;
}

@Injectable()
export class SnapshotService {
  private readonly logger = new Logger(SnapshotService.name);

  constructor(
    private readonly catalog: WeaponCatalogService,
    private readonly components: ComponentCatalogService,
    private readonly registry: WeaponRegistryService,
    private readonly progression: ProgressionService,
    private readonly crafting: CraftingService,
  ) {}

  exportState(rng?: RngState): ArsenalSnapshot {
    // 내부 상태와 공유하지 않도록 깊은 복사
    return structuredClone({
      rng,
      version: SNAPSHOT_VERSION,
      templates: this.catalog.listTemplates(),
      components: this.components.listComponents(),
      instances: this.registry.listInstances(),
      progress: this.progression.listProgress(),
      craftedRecords: this.crafting.listCraftedRecords(),
      activeEffects: this.registry.listActiveEffects(),
    });
  }

  /** 전체가 유효할 때만 현재 상태를 교체한다 */
  importState(raw: unknown): Result<{ counts: ImportCounts; snapshot: ArsenalSnapshot }, InvalidInputError> {
    const parsed = ArsenalSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Snapshot rejected: schema validation failed');
      return err(new InvalidInputError('Invalid snapshot', { issues: formatZodIssues(parsed.error) }));
    }
    const snapshot = parsed.data;

    const problem = this.findInconsistency(snapshot);
    if (problem) {
      this.logger.warn(`Snapshot rejected: ${problem}`);
      return err(new InvalidInputError(`Inconsistent snapshot: ${problem}`));
    }

    this.catalog.replaceAll(snapshot.templates);
    this.components.replaceAll(snapshot.components);
    this.registry.replaceAll(snapshot.instances, snapshot.activeEffects);
    this.progression.replaceAll(snapshot.progress);
    this.crafting.replaceAll(snapshot.craftedRecords);

    const counts: ImportCounts = {
      templates: snapshot.templates.length,
      components: snapshot.components.length,
      instances: snapshot.instances.length,
      progress: snapshot.progress.length,
      craftedRecords: snapshot.craftedRecords.length,
      activeEffects: snapshot.activeEffects.length,
    };
    this.logger.log(`Snapshot imported: ${JSON.stringify(counts)}`);
    return ok({ counts, snapshot });
  }

  private findInconsistency(snapshot: ArsenalSnapshot): string | undefined {
    const templateIds = new Set<string>();
    for (const t of snapshot.templates) {
      if (templateIds.has(t.id)) return `duplicate template ${t.id}`;
      templateIds.add(t.id);
    }

    const componentIds = new Set<string>();
    for (const c of snapshot.components) {
      if (componentIds.has(c.id)) return `duplicate component ${c.id}`;
      componentIds.add(c.id);
    }

    const instanceKeys = new Set<string>();
    for (const i of snapshot.instances) {
      const key = instanceKey(i.playerId, i.templateId);
      if (!templateIds.has(i.templateId)) return `instance ${key} references unknown template`;
      if (instanceKeys.has(key)) return `duplicate instance ${key}`;
      instanceKeys.add(key);
      if (i.effective.id !== i.templateId) return `instance ${key} effective template is ${i.effective.id}`;
      if (i.currentCharge > i.effective.stats.maxCharge) return `instance ${key} charge exceeds maximum`;
      if (i.currentDurability > i.effective.stats.durability) return `instance ${key} durability exceeds maximum`;
    }

    const progressKeys = new Set<string>();
    for (const p of snapshot.progress) {
      const key = instanceKey(p.playerId, p.weaponId);
      if (!instanceKeys.has(key)) return `progress ${key} has no instance`;
      if (progressKeys.has(key)) return `duplicate progress ${key}`;
      if (p.progress.experience >= p.progress.nextLevelExp) return `progress ${key} experience reaches level threshold`;
      progressKeys.add(key);
    }
    for (const key of instanceKeys) {
      if (!progressKeys.has(key)) return `instance ${key} has no progress`;
    }

    for (const r of snapshot.craftedRecords) {
      const key = instanceKey(r.playerId, r.weaponId);
      if (!instanceKeys.has(key)) return `crafted record ${key} has no instance`;
    }

    const activeIds = new Set<string>();
    for (const a of snapshot.activeEffects) {
      if (activeIds.has(a.id)) return `duplicate active effect ${a.id}`;
      activeIds.add(a.id);
      if (!instanceKeys.has(instanceKey(a.playerId, a.weaponId))) return `active effect ${a.id} has no instance`;
    }

    return undefined;
  }
}
