import type {
  Combatant,
  EffectCategory,
  EffectDescriptor,
  TargetOutcome,
  WeaponInstance,
  WeaponTemplate,
} from '../../types/index.js';

export interface EffectResolutionInput {
  effect: EffectDescriptor;
  /** 인스턴스의 effective 템플릿 (baseDamage, damageType 참조) */
  weapon: WeaponTemplate;
  /** 효과 사용자: 유틸리티 효과의 대상 */
  actor: Combatant;
  primary?: Combatant;
  /** 광역/스캔 후보 (입력 순서 유지) */
  candidates?: Combatant[];
  /** 후보 id → 주 대상과의 거리 */
  distances?: Record<string, number>;
  time: number;
  /** 킬/누적 피해 카운터, 충전 환급 대상 */
  instance?: WeaponInstance;
}

export interface EffectResolution {
  success: boolean;
  category?: EffectCategory;
  message: string;
  results: TargetOutcome[];
  totalDamage: number;
  kills: number;
}

export function failedResolution(message: string, category?: EffectCategory): EffectResolution {
  return { success: false, category, message, results: [], totalDamage: 0, kills: 0 };
}
