import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatusService } from './status/status.service.js';
import { DamageService } from './combat/damage.service.js';
import { UtilityService } from './effects/utility.service.js';
import { EffectResolverService } from './effects/effect-resolver.service.js';
import { WeaponCatalogService } from './arsenal/weapon-catalog.service.js';
import { WeaponRegistryService } from './arsenal/weapon-registry.service.js';
import { ProgressionService } from './progression/progression.service.js';
import { ComponentCatalogService } from './crafting/component-catalog.service.js';
import { CraftingService } from './crafting/crafting.service.js';
import { CombatService } from './combat/combat.service.js';
import { SnapshotService } from './snapshot/snapshot.service.js';

const providers = [
  // Layer 1: 난수
  RngService,
  // Layer 2: 전투 규칙
  StatusService,
  DamageService,
  UtilityService,
  EffectResolverService,
  // Layer 3: 무기
  WeaponCatalogService,
  ProgressionService,
  WeaponRegistryService,
  // Layer 4: 제작
  ComponentCatalogService,
  CraftingService,
  // Layer 5: 전투 세션 / 스냅샷
  CombatService,
  SnapshotService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
