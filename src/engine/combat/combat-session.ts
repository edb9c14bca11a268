// 전투 세션 상태 머신
// PREPARATION → IN_PROGRESS → {PLAYER_VICTORY | ENEMY_VICTORY | ESCAPED | ABORTED}
// 논리 시각 = 라운드 번호. 쿨다운/상태 지속시간 모두 라운드 단위.

import { Logger } from '@nestjs/common';
import { CombatStateError } from '../../common/errors/game-errors.js';
import type { RandomSource } from '../rng/rng.service.js';
import type { WeaponRegistryService } from '../arsenal/weapon-registry.service.js';
import type { ProgressionService } from '../progression/progression.service.js';
import type { EffectResolverService } from '../effects/effect-resolver.service.js';
import type { EffectResolution } from '../effects/effect-resolution.js';
import type { StatusService } from '../status/status.service.js';
import type { DamageService } from './damage.service.js';
import {
  err,
  isAlive,
  ok,
  type ActivationContext,
  type CombatAction,
  type CombatPhase,
  type CombatSide,
  type Combatant,
  type ModifierKind,
  type Result,
  type WeaponInstance,
} from '../../types/index.js';

export const BASE_ESCAPE_CHANCE = 0.5;
export const CROWDED_ESCAPE_PENALTY = 0.2;
/** 이 수보다 많은 적이 살아 있으면 도주 페널티 */
export const CROWDED_ENEMY_COUNT = 3;
export const BASE_CRITICAL_CHANCE = 0.2;
export const CRITICAL_MULTIPLIER = 1.5;
export const KILL_BASE_EXP = 100;
export const DEFAULT_INITIATIVE = 10;

export interface CombatDeps {
  registry: WeaponRegistryService;
  progression: ProgressionService;
  resolver: EffectResolverService;
  damage: DamageService;
  status: StatusService;
}

export interface CombatActionInput {
  kind: CombatAction;
  targetId?: string;
  effectId?: string;
}

export interface ActionOutcome {
  success: boolean;
  action: CombatAction;
  actorId: string;
  targetId?: string;
  message: string;
  damage: number;
  kills: number;
  critical: boolean;
  effectId?: string;
  resolution?: EffectResolution;
  phase: CombatPhase;
}

export interface InitiativeEntry {
  id: string;
  score: number;
}

export interface ParticipantStatus {
  id: string;
  name: string;
  side: CombatSide;
  health: number;
  maxHealth: number;
  statuses: string[];
  modifiers: ModifierKind[];
}

export interface CombatStatus {
  id: string;
  phase: CombatPhase;
  turn: number;
  currentActorId?: string;
  initiative: InitiativeEntry[];
  participants: ParticipantStatus[];
  log: string[];
}

const TERMINAL: readonly CombatPhase[] = ['PLAYER_VICTORY', 'ENEMY_VICTORY', 'ESCAPED', 'ABORTED'];

export class CombatSession {
  private readonly logger = new Logger(CombatSession.name);
  private phase: CombatPhase = 'PREPARATION';
  private turn = 0;
  private order: InitiativeEntry[] = [];
  private currentIndex = 0;
  private readonly messages: string[] = [];
  /** 전투원 id → 연속 명중 수 */
  private readonly hitStreaks = new Map<string, number>();

  constructor(
    readonly id: string,
    private readonly participants: Combatant[],
    private readonly rng: RandomSource,
    private readonly deps: CombatDeps,
    private readonly logTail: number,
  ) {}

  get currentPhase(): CombatPhase {
    return this.phase;
  }

  get currentTurn(): number {
    return this.turn;
  }

  get currentActor(): Combatant | undefined {
    if (this.phase === 'PREPARATION') return undefined;
    const entry = this.order[this.currentIndex];
    return entry ? this.find(entry.id) : undefined;
  }

  isTerminal(): boolean {
    return TERMINAL.includes(this.phase);
  }

  getParticipant(id: string): Combatant | undefined {
    return this.find(id);
  }

  // --- 시작 ---

  start(): Result<CombatStatus, CombatStateError> {
    if (this.phase !== 'PREPARATION') {
      return err(new CombatStateError('INVALID_PHASE', `Combat ${this.id} already started`, { phase: this.phase }));
    }

    const scored = this.participants.map((p) => ({ id: p.id, score: this.baseInitiative(p) + this.rng.range(1, 10) }));
    // Array.prototype.sort 는 안정 정렬: 동점은 입력 순서
    this.order = [...scored].sort((a, b) => b.score - a.score);
    this.phase = 'IN_PROGRESS';
    this.turn = 1;
    this.currentIndex = 0;

    this.log(`Initiative order: ${this.order.map((e) => `${this.nameOf(e.id)} (${e.score})`).join(', ')}`);
    this.logger.log(`Combat ${this.id} started with ${this.participants.length} participants`);
    this.skipFallenActors();
    // 한쪽이 처음부터 전멸이면 바로 종료
    this.checkTerminal();
    const actor = this.phase === 'IN_PROGRESS' ? this.currentActor : undefined;
    if (actor) this.log(`It is ${actor.name}'s turn`);
    return ok(this.getStatus());
  }

  private baseInitiative(c: Combatant): number {
    if (c.reflexes !== undefined && c.intelligence !== undefined) return c.reflexes + c.intelligence;
    return c.initiative ?? DEFAULT_INITIATIVE;
  }

  // --- 행동 ---

  performAction(actorId: string, input: CombatActionInput): Result<ActionOutcome, CombatStateError> {
    const rejected = this.validateAction(actorId, input.kind);
    if (rejected) {
      this.log(rejected.message);
      return err(rejected);
    }
    const actor = this.find(actorId);
    if (!actor) return err(new CombatStateError('UNKNOWN_PARTICIPANT', `Unknown participant: ${actorId}`));

    const isCurrent = this.currentActor?.id === actorId;
    let outcome: ActionOutcome;
    switch (input.kind) {
      case 'ATTACK': {
        const target = this.resolveTarget(actor, input.targetId);
        if (!target.ok) {
          this.log(target.error.message);
          return target;
        }
        outcome = this.attack(actor, target.value);
        break;
      }
      case 'SPECIAL': {
        const target = this.resolveTarget(actor, input.targetId);
        if (!target.ok) {
          this.log(target.error.message);
          return target;
        }
        outcome = this.special(actor, target.value, input.effectId);
        break;
      }
      case 'DEFEND':
        outcome = this.defend(actor);
        break;
      case 'ESCAPE':
        outcome = this.escape(actor);
        break;
    }

    if (input.kind !== 'ATTACK') this.hitStreaks.set(actor.id, 0);
    this.log(outcome.message);

    // 반응형 방어는 턴을 넘기지 않는다
    if (outcome.success && isCurrent && this.phase === 'IN_PROGRESS') {
      this.advance();
    }
    return ok({ ...outcome, phase: this.phase });
  }

  private validateAction(actorId: string, kind: CombatAction): CombatStateError | undefined {
    if (this.phase === 'PREPARATION') {
      return new CombatStateError('INVALID_PHASE', `Combat ${this.id} has not started`, { phase: this.phase });
    }
    if (this.isTerminal()) {
      return new CombatStateError('COMBAT_NOT_ACTIVE', `Combat ${this.id} is over (${this.phase})`, { phase: this.phase });
    }
    const actor = this.find(actorId);
    if (!actor) return new CombatStateError('UNKNOWN_PARTICIPANT', `Unknown participant: ${actorId}`, { actorId });
    if (!isAlive(actor)) return new CombatStateError('NOT_YOUR_TURN', `${actor.name} is down`, { actorId });
    if (kind !== 'DEFEND' && this.currentActor?.id !== actorId) {
      return new CombatStateError('NOT_YOUR_TURN', `It is not ${actor.name}'s turn`, {
        actorId,
        currentActorId: this.currentActor?.id,
      });
    }
    return undefined;
  }

  /** 대상 미지정 시 첫 번째 생존 적 */
  private resolveTarget(actor: Combatant, targetId?: string): Result<Combatant, CombatStateError> {
    if (targetId === undefined) {
      const fallback = this.opponentsOf(actor)[0];
      if (!fallback) return err(new CombatStateError('INVALID_TARGET', 'No target available'));
      return ok(fallback);
    }
    const target = this.find(targetId);
    if (!target) return err(new CombatStateError('UNKNOWN_PARTICIPANT', `Unknown participant: ${targetId}`, { targetId }));
    if (target.side === actor.side || !isAlive(target)) {
      return err(new CombatStateError('INVALID_TARGET', `${target.name} cannot be targeted`, { targetId }));
    }
    return ok(target);
  }

  private attack(actor: Combatant, target: Combatant): ActionOutcome {
    const instance = this.equippedInstance(actor);
    const critical = this.rng.roll(
      BASE_CRITICAL_CHANCE +
        (instance?.effective.stats.criticalChance ?? 0) +
        this.deps.status.boostTotal(actor, 'CRITICAL_CHANCE'),
    );

    if (instance) {
      const context = this.activationContext(actor, target, critical);
      const activation = this.deps.registry.checkActivation(actor.id, instance.templateId, context, this.rng);
      if (activation.eligible) {
        const effect = activation.effects[0];
        // checkActivation 에서 이미 확률 판정을 통과했다
        const special = this.runEffect(actor, target, instance, effect.id, context, true, critical);
        if (special.success) return special;
        this.log(`Special effect failed: ${special.message}`);
      } else {
        this.logger.debug(`${actor.id}: no special effect (${activation.reason})`);
      }
    }

    return this.standardAttack(actor, target, instance, critical);
  }

  private standardAttack(
    actor: Combatant,
    target: Combatant,
    instance: WeaponInstance | undefined,
    critical: boolean,
  ): ActionOutcome {
    const stats = instance?.effective.stats;
    const damageType = stats?.damageType ?? actor.damageType;
    const breakdown = this.deps.damage.computeDamage(
      {
        damage: 0,
        damageMultiplier: critical ? CRITICAL_MULTIPLIER + (stats?.criticalDamage ?? 0) : 1,
        armorPenetration: stats?.armorPenetration ?? 0,
        damageType,
      },
      stats?.baseDamage ?? actor.attack,
      target,
    );
    const applied = this.deps.damage.applyDamage(target, breakdown.final);
    this.hitStreaks.set(actor.id, (this.hitStreaks.get(actor.id) ?? 0) + 1);

    if (instance) {
      this.deps.registry.recordDamage(actor.id, instance.templateId, applied.dealt);
      if (applied.killed) this.deps.registry.recordKill(actor.id, instance.templateId);
      this.deps.registry.recharge(actor.id, instance.templateId, instance.effective.stats.chargeRate);
      this.grantCombatExperience(instance, applied.dealt, applied.killed ? 1 : 0, critical);
    }

    let message = `${actor.name} attacks ${target.name} for ${applied.dealt} ${damageType} damage`;
    if (critical) message += ' (critical)';
    if (applied.absorbed > 0) message += `, ${applied.absorbed} absorbed`;
    if (applied.killed) message += `. ${target.name} is down`;

    return {
      success: true,
      action: 'ATTACK',
      actorId: actor.id,
      targetId: target.id,
      message,
      damage: applied.dealt,
      kills: applied.killed ? 1 : 0,
      critical,
      phase: this.phase,
    };
  }

  private special(actor: Combatant, target: Combatant, effectId?: string): ActionOutcome {
    const instance = this.equippedInstance(actor);
    const failure = (message: string): ActionOutcome => ({
      success: false,
      action: 'SPECIAL',
      actorId: actor.id,
      targetId: target.id,
      message,
      damage: 0,
      kills: 0,
      critical: false,
      effectId,
      phase: this.phase,
    });

    if (!instance) return failure(`${actor.name} has no special weapon equipped`);
    if (!effectId) return failure('No effect selected');

    const critical = this.rng.roll(
      BASE_CRITICAL_CHANCE +
        instance.effective.stats.criticalChance +
        this.deps.status.boostTotal(actor, 'CRITICAL_CHANCE'),
    );
    const context = this.activationContext(actor, target, critical);
    const outcome = this.runEffect(actor, target, instance, effectId, context, false, critical);
    return { ...outcome, action: 'SPECIAL' };
  }

  /** registry.trigger → resolver.resolve → 활성 효과 기록 → 경험치 */
  private runEffect(
    actor: Combatant,
    target: Combatant,
    instance: WeaponInstance,
    effectId: string,
    context: ActivationContext,
    skipChanceRoll: boolean,
    critical: boolean,
  ): ActionOutcome {
    const base = {
      action: 'ATTACK' as const,
      actorId: actor.id,
      targetId: target.id,
      effectId,
      critical,
      phase: this.phase,
    };

    const triggered = this.deps.registry.trigger(actor.id, instance.templateId, effectId, context, this.rng, {
      skipChanceRoll,
      targets: [target.id],
    });
    if (!triggered.ok) {
      return { ...base, success: false, message: triggered.error.message, damage: 0, kills: 0 };
    }

    const candidates = this.opponentsOf(actor);
    const distances: Record<string, number> = {};
    for (const c of candidates) distances[c.id] = Math.abs(c.position - target.position);

    const resolution = this.deps.resolver.resolve(
      {
        effect: triggered.value.effect,
        weapon: instance.effective,
        actor,
        primary: target,
        candidates,
        distances,
        time: this.turn,
        instance,
      },
      this.rng,
    );
    this.deps.registry.recordResults(triggered.value.activeEffect.id, resolution.results);

    if (resolution.totalDamage > 0) {
      this.hitStreaks.set(actor.id, (this.hitStreaks.get(actor.id) ?? 0) + 1);
    }
    this.grantCombatExperience(instance, resolution.totalDamage, resolution.kills, critical && resolution.totalDamage > 0);

    return {
      ...base,
      success: resolution.success,
      message: `${actor.name} uses ${triggered.value.effect.name}: ${resolution.message}`,
      damage: resolution.totalDamage,
      kills: resolution.kills,
      resolution,
    };
  }

  private defend(actor: Combatant): ActionOutcome {
    // 자기 다음 턴 시작 시 해제 (라운드 만료보다 길게 잡아 둔다)
    this.deps.status.addModifier(actor, {
      kind: 'DEFEND',
      value: 1,
      startTime: this.turn,
      endTime: this.turn + 2,
    });
    return {
      success: true,
      action: 'DEFEND',
      actorId: actor.id,
      message: `${actor.name} takes a defensive stance`,
      damage: 0,
      kills: 0,
      critical: false,
      phase: this.phase,
    };
  }

  private escape(actor: Combatant): ActionOutcome {
    const base = { action: 'ESCAPE' as const, actorId: actor.id, damage: 0, kills: 0, critical: false };
    if (actor.side !== 'PLAYER') {
      return { ...base, success: false, message: `${actor.name} cannot escape`, phase: this.phase };
    }

    const enemiesAlive = this.participants.filter((p) => p.side === 'ENEMY' && isAlive(p)).length;
    const chance = BASE_ESCAPE_CHANCE - (enemiesAlive > CROWDED_ENEMY_COUNT ? CROWDED_ESCAPE_PENALTY : 0);
    if (!this.rng.roll(chance)) {
      return { ...base, success: false, message: `${actor.name} failed to escape`, phase: this.phase };
    }

    this.phase = 'ESCAPED';
    this.logger.log(`Combat ${this.id} ended: ESCAPED`);
    return { ...base, success: true, message: `${actor.name} escaped from combat`, phase: this.phase };
  }

  // --- 턴 진행 ---

  nextTurn(): Result<CombatStatus, CombatStateError> {
    if (this.phase !== 'IN_PROGRESS') {
      return err(new CombatStateError('COMBAT_NOT_ACTIVE', `Combat ${this.id} is not in progress`, { phase: this.phase }));
    }
    this.advance();
    return ok(this.getStatus());
  }

  abort(): Result<CombatStatus, CombatStateError> {
    if (this.isTerminal()) {
      return err(new CombatStateError('COMBAT_NOT_ACTIVE', `Combat ${this.id} is over (${this.phase})`, { phase: this.phase }));
    }
    this.phase = 'ABORTED';
    this.log('Combat aborted');
    this.logger.log(`Combat ${this.id} ended: ABORTED`);
    return ok(this.getStatus());
  }

  /** 다음 생존 행동자로. 한 바퀴 돌면 라운드 증가 + 지속 효과 */
  private advance(): void {
    this.stepIndex();
    this.skipFallenActors();

    this.checkTerminal();
    if (this.phase !== 'IN_PROGRESS') return;

    const actor = this.currentActor;
    if (!actor) return;
    if (this.deps.status.getModifier(actor, 'DEFEND')) this.deps.status.removeModifier(actor, 'DEFEND');
    this.log(`It is ${actor.name}'s turn`);
  }

  private stepIndex(): void {
    this.currentIndex = (this.currentIndex + 1) % this.order.length;
    if (this.currentIndex === 0) this.beginRound();
  }

  private skipFallenActors(): void {
    for (let i = 0; i < this.order.length; i++) {
      const actor = this.currentActor;
      if (!actor || isAlive(actor) || this.allDown('PLAYER') || this.allDown('ENEMY')) return;
      this.stepIndex();
    }
  }

  private beginRound(): void {
    this.turn++;
    this.log(`===== Turn ${this.turn} =====`);

    for (const p of this.participants) {
      if (!isAlive(p)) continue;
      for (const tick of this.deps.status.tickDamageOverTime(p)) {
        this.log(`${p.name} takes ${tick.damage} damage from ${tick.statusType}`);
      }
      for (const type of this.deps.status.expireStatuses(p, this.turn)) {
        this.log(`${type} wears off ${p.name}`);
      }
      this.deps.status.expireModifiers(p, this.turn);
    }

    const participantIds = this.participants.map((p) => p.id);
    for (const expired of this.deps.registry.tick(this.turn, participantIds)) {
      this.logger.debug(`Active effect expired: ${expired.id}`);
    }
  }

  private checkTerminal(): void {
    if (this.allDown('PLAYER')) {
      this.phase = 'ENEMY_VICTORY';
      this.log('All players have been defeated');
    } else if (this.allDown('ENEMY')) {
      this.phase = 'PLAYER_VICTORY';
      this.log('All enemies have been defeated');
    } else {
      return;
    }
    this.logger.log(`Combat ${this.id} ended: ${this.phase}`);
  }

  private allDown(side: CombatSide): boolean {
    return this.participants.filter((p) => p.side === side).every((p) => !isAlive(p));
  }

  // --- 상태 조회 ---

  getStatus(): CombatStatus {
    return {
      id: this.id,
      phase: this.phase,
      turn: this.turn,
      currentActorId: this.isTerminal() ? undefined : this.currentActor?.id,
      initiative: this.order.map((e) => ({ ...e })),
      participants: this.participants.map((p) => ({
        id: p.id,
        name: p.name,
        side: p.side,
        health: p.health,
        maxHealth: p.maxHealth,
        statuses: Object.keys(p.statuses),
        modifiers: p.modifiers.map((m) => m.kind),
      })),
      log: this.messages.slice(-this.logTail),
    };
  }

  getLog(): string[] {
    return [...this.messages];
  }

  // --- helpers ---

  private activationContext(actor: Combatant, target: Combatant, critical: boolean): ActivationContext {
    return {
      time: this.turn,
      targetHealthPercent: (target.health / target.maxHealth) * 100,
      consecutiveHits: this.hitStreaks.get(actor.id) ?? 0,
      enemyCount: this.opponentsOf(actor).length,
      isCritical: critical,
    };
  }

  private grantCombatExperience(instance: WeaponInstance, damage: number, kills: number, critical: boolean): void {
    const { progression } = this.deps;
    if (damage > 0) {
      progression.grantExperience(instance, 'DAMAGE_DEALT', damage);
      if (critical) progression.grantExperience(instance, 'CRITICAL_HIT', damage);
    }
    if (kills > 0) progression.grantExperience(instance, 'KILL', KILL_BASE_EXP * kills);
  }

  private equippedInstance(actor: Combatant): WeaponInstance | undefined {
    if (!actor.equippedWeaponId) return undefined;
    return this.deps.registry.getInstance(actor.id, actor.equippedWeaponId);
  }

  private opponentsOf(actor: Combatant): Combatant[] {
    return this.participants.filter((p) => p.side !== actor.side && isAlive(p));
  }

  private find(id: string): Combatant | undefined {
    return this.participants.find((p) => p.id === id);
  }

  private nameOf(id: string): string {
    return this.find(id)?.name ?? id;
  }

  private log(message: string): void {
    this.messages.push(message);
    this.logger.debug(`[${this.id}] ${message}`);
  }
}
