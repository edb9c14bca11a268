// Canonical Enums: 무기/전투/제작 공통

export const WEAPON_CATEGORY = [
  'ENERGY',
  'MELEE',
  'PROJECTILE',
  'TECH',
  'EXPERIMENTAL',
] as const;
export type WeaponCategory = (typeof WEAPON_CATEGORY)[number];

export const RARITY = ['COMMON', 'RARE', 'EPIC', 'LEGENDARY', 'ARTIFACT'] as const;
export type Rarity = (typeof RARITY)[number];

/** 서수 값 (블렌딩/비교용) */
export const RARITY_VALUE: Record<Rarity, number> = {
  COMMON: 1,
  RARE: 2,
  EPIC: 3,
  LEGENDARY: 4,
  ARTIFACT: 5,
};

export const DAMAGE_TYPE = [
  'PHYSICAL',
  'ENERGY',
  'THERMAL',
  'CHEMICAL',
  'EMP',
  'TECH',
  'ELEMENTAL',
  'VOID',
  'EXPLOSIVE',
  'VARIABLE',
] as const;
export type DamageType = (typeof DAMAGE_TYPE)[number];

export const EFFECT_CATEGORY = ['DAMAGE', 'STATUS', 'UTILITY'] as const;
export type EffectCategory = (typeof EFFECT_CATEGORY)[number];

export const UTILITY_TYPE = [
  'TELEPORT',
  'STEALTH',
  'SHIELD',
  'SCAN',
  'HEAL',
  'CHARGE_REFUND',
  'BOOST',
] as const;
export type UtilityType = (typeof UTILITY_TYPE)[number];

export const BOOST_STAT = ['CRITICAL_CHANCE', 'ACCURACY', 'RELOAD_SPEED'] as const;
export type BoostStat = (typeof BOOST_STAT)[number];

export const COMPONENT_CATEGORY = [
  'FRAME',
  'BARREL',
  'POWER_SOURCE',
  'FOCUSING',
  'HANDLE',
  'MODIFIER',
  'STABILIZER',
  'AMPLIFIER',
] as const;
export type ComponentCategory = (typeof COMPONENT_CATEGORY)[number];

export const EXPERIENCE_SOURCE = [
  'DAMAGE_DEALT',
  'CRITICAL_HIT',
  'KILL',
  'EFFECT_TRIGGERED',
] as const;
export type ExperienceSource = (typeof EXPERIENCE_SOURCE)[number];

export const COMBAT_PHASE = [
  'PREPARATION',
  'IN_PROGRESS',
  'PLAYER_VICTORY',
  'ENEMY_VICTORY',
  'ESCAPED',
  'ABORTED',
] as const;
export type CombatPhase = (typeof COMBAT_PHASE)[number];

export const COMBAT_ACTION = ['ATTACK', 'DEFEND', 'ESCAPE', 'SPECIAL'] as const;
export type CombatAction = (typeof COMBAT_ACTION)[number];

export const COMBAT_SIDE = ['PLAYER', 'ENEMY'] as const;
export type CombatSide = (typeof COMBAT_SIDE)[number];

export const MODIFIER_KIND = ['STEALTH', 'SHIELD', 'BOOST', 'DEFEND'] as const;
export type ModifierKind = (typeof MODIFIER_KIND)[number];
